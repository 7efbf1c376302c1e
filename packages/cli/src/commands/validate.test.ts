import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { validateRegistryFile } from "@/commands/validate";
import { DEFAULT_CONFIG } from "@/lib/config";

let projectDir: string;

async function writeRegistry(name: string, records: unknown) {
  const filePath = join(projectDir, name);
  await writeFile(filePath, JSON.stringify(records, null, 2), "utf8");
  return filePath;
}

describe("validateRegistryFile", () => {
  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "cli-validate-"));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it("accepts a well-formed registry", async () => {
    const filePath = await writeRegistry("repositories.json", [
      {
        name: "Acme/Mod",
        custom_name: "Acme Mod",
        url: "https://github.com/Acme/Mod",
      },
    ]);

    const result = await validateRegistryFile({ path: filePath });

    expect(result.filePath).toBe(filePath);
    expect(result.report.isAcceptable).toBe(true);
    expect(result.report.violations).toEqual([]);
    expect(result.report.entryCount).toBe(1);
  });

  it("reports every problem in one pass", async () => {
    const filePath = await writeRegistry("repositories.json", [
      {
        name: "Acme/Mod",
        custom_name: "Acme Mod",
        url: "https://github.com/Acme/Mod",
      },
      { name: "acme/mod", custom_name: "Copy", url: "https://github.com/acme/mod" },
      { name: "Beta", custom_name: "Beta", url: "https://github.com/Beta" },
    ]);

    const result = await validateRegistryFile({ path: filePath });

    expect(result.report.isAcceptable).toBe(false);
    expect(result.report.violations.map((v) => [v.recordIndex, v.kind])).toEqual([
      [1, "DuplicateEntry"],
      [2, "InvalidNameFormat"],
    ]);
  });

  it("uses the configured registry file and host", async () => {
    await writeRegistry("mods.json", [
      {
        name: "Acme/Mod",
        custom_name: "Acme Mod",
        url: "https://git.example.test/Acme/Mod",
      },
    ]);

    const result = await validateRegistryFile({
      config: {
        ...DEFAULT_CONFIG,
        registryFile: join(projectDir, "mods.json"),
        hostBaseUrl: "https://git.example.test",
      },
    });

    expect(result.filePath).toBe(join(projectDir, "mods.json"));
    expect(result.report.isAcceptable).toBe(true);
  });

  it("fails when the file does not exist", async () => {
    const filePath = join(projectDir, "missing.json");

    await expect(validateRegistryFile({ path: filePath })).rejects.toThrow(
      `Registry file not found: ${filePath}`
    );
  });
});
