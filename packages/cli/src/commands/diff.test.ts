import { RegistryFormatError } from "@modgate/core";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { diffRegistryFiles } from "@/commands/diff";

let projectDir: string;

const ACME = {
  name: "Acme/Mod",
  custom_name: "Acme Mod",
  url: "https://github.com/Acme/Mod",
};

const BETA = {
  name: "Beta/Pack",
  custom_name: "Beta Pack",
  url: "https://github.com/Beta/Pack",
};

async function writeRegistry(name: string, records: unknown) {
  const filePath = join(projectDir, name);
  await writeFile(filePath, JSON.stringify(records, null, 2), "utf8");
  return filePath;
}

describe("diffRegistryFiles", () => {
  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "cli-diff-"));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it("reports an appended entry as additive", async () => {
    const oldPath = await writeRegistry("old.json", [ACME]);
    const newPath = await writeRegistry("new.json", [ACME, BETA]);

    const { changes } = await diffRegistryFiles({ oldPath, newPath });

    expect(changes.added).toEqual([BETA]);
    expect(changes.removed).toEqual([]);
    expect(changes.modified).toEqual([]);
    expect(changes.unchanged).toBe(1);
    expect(changes.isAdditive).toBe(true);
  });

  it("flags edited entries", async () => {
    const oldPath = await writeRegistry("old.json", [ACME, BETA]);
    const newPath = await writeRegistry("new.json", [
      { ...ACME, custom_name: "Renamed" },
      BETA,
    ]);

    const { changes } = await diffRegistryFiles({ oldPath, newPath });

    expect(changes.isAdditive).toBe(false);
    expect(changes.modified.map((m) => m.changedFields)).toEqual([
      ["custom_name"],
    ]);
    expect(changes.warnings.map((w) => w.message)).toEqual([
      'Existing entry "Acme/Mod" was modified (custom_name)',
    ]);
  });

  it("refuses a snapshot that does not validate", async () => {
    const oldPath = await writeRegistry("old.json", [ACME]);
    const newPath = await writeRegistry("new.json", [{ name: "Beta/Pack" }]);

    await expect(diffRegistryFiles({ oldPath, newPath })).rejects.toBeInstanceOf(
      RegistryFormatError
    );
  });
});
