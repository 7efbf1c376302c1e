import {
  appendRegistryEntry,
  createRegistryEntry,
  type RegistryEntry,
} from "@modgate/core";
import { writeFile } from "fs/promises";
import { type Config, DEFAULT_CONFIG } from "@/lib/config";
import { readTextFile } from "@/lib/fs";
import { log } from "@/lib/log";

export type AddOptions = {
  /** `{owner}/{repo}` */
  name: string;
  customName: string;
  description?: string;
  path?: string;
  config?: Config;
  dryRun?: boolean;
};

export type AddResult = {
  filePath: string;
  entry: RegistryEntry;
  entryCount: number;
  /** The registry file did not exist before */
  created: boolean;
  dryRun: boolean;
};

/**
 * Appends an entry to the registry file, the way a contributor would by
 * hand before opening a pull request.
 */
export async function addEntry(options: AddOptions): Promise<AddResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const filePath = options.path ?? config.registryFile;
  const dryRun = Boolean(options.dryRun);

  const current = await readTextFile(filePath);
  if (current === null) {
    log.debug(`${filePath} does not exist, starting an empty registry`);
  }

  const entry = createRegistryEntry({
    name: options.name,
    customName: options.customName,
    description: options.description,
    hostBaseUrl: config.hostBaseUrl,
  });

  const result = appendRegistryEntry(current ?? "[]", entry, {
    hostBaseUrl: config.hostBaseUrl,
  });

  if (dryRun) {
    log.debug("Dry run, not writing");
  } else {
    await writeFile(filePath, result.text, "utf8");
  }

  return {
    filePath,
    entry,
    entryCount: result.entryCount,
    created: current === null,
    dryRun,
  };
}
