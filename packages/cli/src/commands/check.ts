import {
  checkRepositories,
  type LivenessResult,
  type LivenessStatus,
  readRegistry,
} from "@modgate/core";
import { type Config, DEFAULT_CONFIG } from "@/lib/config";
import { readRegistryFile } from "@/lib/fs";
import { log } from "@/lib/log";

export type CheckOptions = {
  path?: string;
  config?: Config;
  token?: string;
  signal?: AbortSignal;
  onResult?: (result: LivenessResult, done: number, total: number) => void;
};

export type CheckResult = {
  filePath: string;
  results: LivenessResult[];
  counts: Record<LivenessStatus, number>;
  /** False when any repository is gone */
  allPresent: boolean;
};

export async function checkRegistryFile(
  options: CheckOptions = {}
): Promise<CheckResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const filePath = options.path ?? config.registryFile;

  const entries = readRegistry(await readRegistryFile(filePath), {
    hostBaseUrl: config.hostBaseUrl,
  });
  log.debug(
    `Checking ${entries.length} repositories against ${config.check.apiBaseUrl}`
  );

  const results = await checkRepositories(entries, {
    apiBaseUrl: config.check.apiBaseUrl,
    timeoutMs: config.check.timeoutMs,
    concurrency: config.check.concurrency,
    token: options.token,
    signal: options.signal,
    onResult: options.onResult,
  });

  const counts: Record<LivenessStatus, number> = {
    ok: 0,
    missing: 0,
    "rate-limited": 0,
    error: 0,
  };
  for (const result of results) {
    counts[result.status]++;
  }

  return { filePath, results, counts, allPresent: counts.missing === 0 };
}
