import {
  DEFAULT_API_BASE_URL,
  DEFAULT_CHECK_CONCURRENCY,
  DEFAULT_CHECK_TIMEOUT_MS,
  DEFAULT_HOST_BASE_URL,
  REGISTRY_FILENAME,
} from "@modgate/core";
import { InvalidArgumentError } from "commander";
import { join, resolve } from "path";
import { z } from "zod";
import { readTextFile } from "./fs";
import { log } from "./log";

/** Optional project config, looked up in the working directory */
export const CONFIG_FILENAME = "modgate.config.json";
const CONFIG_PATH_ENV = "MODGATE_CONFIG";
const TOKEN_ENV = "GITHUB_TOKEN";

export type CheckSettings = {
  apiBaseUrl: string;
  timeoutMs: number;
  concurrency: number;
};

export type Config = {
  /** Registry file, relative to the working directory */
  registryFile: string;
  /** Base every entry URL is derived from */
  hostBaseUrl: string;
  check: CheckSettings;
};

export const DEFAULT_CONFIG: Config = {
  registryFile: REGISTRY_FILENAME,
  hostBaseUrl: DEFAULT_HOST_BASE_URL,
  check: {
    apiBaseUrl: DEFAULT_API_BASE_URL,
    timeoutMs: DEFAULT_CHECK_TIMEOUT_MS,
    concurrency: DEFAULT_CHECK_CONCURRENCY,
  },
};

const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    registryFile: z.string().trim().min(1).optional(),
    hostBaseUrl: z.string().url().optional(),
    check: z
      .object({
        apiBaseUrl: z.string().url().optional(),
        timeoutMs: z.number().int().positive().optional(),
        concurrency: z.number().int().min(1).max(32).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export function getConfigPath(cwd: string = process.cwd()) {
  const custom = process.env[CONFIG_PATH_ENV];
  if (custom && custom.trim().length > 0) {
    return resolve(cwd, custom);
  }
  return join(cwd, CONFIG_FILENAME);
}

/**
 * Loads the project config, falling back to defaults when there is none.
 *
 * @throws Error when the file exists but is not valid JSON or has unknown
 * or invalid settings
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<Config> {
  const configPath = getConfigPath(cwd);
  log.debug(`Loading config from ${configPath}`);

  const raw = await readTextFile(configPath);
  if (raw === null) {
    log.debug("No config file, using defaults");
    return structuredClone(DEFAULT_CONFIG);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new Error(
      `Invalid config ${configPath}: ${where}${issue?.message ?? "unknown error"}`
    );
  }

  return mergeWithDefaults(parsed.data);
}

/**
 * Option parser for `--timeout` and `--concurrency`.
 */
export function parsePositiveInt(value: string): number {
  const parsed = value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * GitHub token for the liveness check, if one is set.
 */
export function getGithubToken(): string | undefined {
  const token = process.env[TOKEN_ENV]?.trim();
  return token ? token : undefined;
}

function mergeWithDefaults(partial: ConfigFile): Config {
  return {
    registryFile: partial.registryFile ?? DEFAULT_CONFIG.registryFile,
    hostBaseUrl: partial.hostBaseUrl ?? DEFAULT_CONFIG.hostBaseUrl,
    check: {
      ...DEFAULT_CONFIG.check,
      ...(partial.check ?? {}),
    },
  };
}
