/**
 * Shared constants for modgate.
 */

/** Filename of the community registry at the repository root */
export const REGISTRY_FILENAME = "repositories.json";

/** Base URL every entry's `url` is derived from (`{base}{owner}/{repo}`) */
export const DEFAULT_HOST_BASE_URL = "https://github.com/";

/** GitHub REST API root used by the liveness check */
export const DEFAULT_API_BASE_URL = "https://api.github.com";

/** Per-request timeout for the liveness check */
export const DEFAULT_CHECK_TIMEOUT_MS = 10_000;

/** Concurrent requests during a liveness check */
export const DEFAULT_CHECK_CONCURRENCY = 4;

/** Indentation used when writing the registry back to disk */
export const REGISTRY_INDENT = 2;

/**
 * GitHub API endpoint paths (relative to the API base URL).
 */
export const GITHUB_ENDPOINTS = {
  /** Repository metadata */
  repo: (owner: string, repo: string) => `/repos/${owner}/${repo}`,
  /** Latest published release */
  latestRelease: (owner: string, repo: string) =>
    `/repos/${owner}/${repo}/releases/latest`,
} as const;
