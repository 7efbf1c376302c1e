import { type ChangeSet, diffRegistries, readRegistry } from "@modgate/core";
import { type Config, DEFAULT_CONFIG } from "@/lib/config";
import { readRegistryFile } from "@/lib/fs";
import { log } from "@/lib/log";

export type DiffOptions = {
  /** Accepted registry */
  oldPath: string;
  /** Proposed registry */
  newPath: string;
  config?: Config;
};

export type DiffResult = {
  oldPath: string;
  newPath: string;
  changes: ChangeSet;
};

export async function diffRegistryFiles(
  options: DiffOptions
): Promise<DiffResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const validateOptions = { hostBaseUrl: config.hostBaseUrl };

  log.debug(`Reading ${options.oldPath}`);
  const oldRegistry = readRegistry(
    await readRegistryFile(options.oldPath),
    validateOptions
  );

  log.debug(`Reading ${options.newPath}`);
  const newRegistry = readRegistry(
    await readRegistryFile(options.newPath),
    validateOptions
  );

  return {
    oldPath: options.oldPath,
    newPath: options.newPath,
    changes: diffRegistries(oldRegistry, newRegistry),
  };
}
