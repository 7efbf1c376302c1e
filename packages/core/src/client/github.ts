/**
 * Repository liveness check.
 *
 * Confirms every listed repository still exists on GitHub and picks up the
 * data consumers show alongside an entry (platform description, latest
 * release tag). This runs on top of the validator, never inside it: it does
 * network I/O, so each request is bounded by a timeout and the whole run can
 * be cancelled through an AbortSignal.
 */

import {
  DEFAULT_API_BASE_URL,
  DEFAULT_CHECK_CONCURRENCY,
  DEFAULT_CHECK_TIMEOUT_MS,
  GITHUB_ENDPOINTS,
} from "../constants";
import { CancellationError, getErrorMessage, NetworkError } from "../errors";
import { parseRepositoryName } from "../registry/name";
import type { RegistryEntry } from "../registry/types";

export type LivenessStatus = "ok" | "missing" | "rate-limited" | "error";

export type LivenessResult = {
  name: string;
  url: string;
  status: LivenessStatus;
  /** Repository description on GitHub (null when it has none) */
  platformDescription?: string | null;
  /** Tag of the latest release (null when nothing is released) */
  latestRelease?: string | null;
  /** Why the check did not succeed */
  message?: string;
};

export type CheckOptions = {
  /** GitHub API root (default: https://api.github.com) */
  apiBaseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Requests in flight at once */
  concurrency?: number;
  /** Token sent as a bearer credential, raising the rate limit */
  token?: string;
  /** Cancels the whole run */
  signal?: AbortSignal;
  /** Called as each entry finishes */
  onResult?: (result: LivenessResult, done: number, total: number) => void;
};

type RequestOptions = Required<Pick<CheckOptions, "apiBaseUrl" | "timeoutMs">> &
  Pick<CheckOptions, "token" | "signal">;

type ReadBody<T> = (response: Response) => Promise<T>;

/**
 * Runs a request and reads its body under one timeout. The external signal
 * stays attached until `read` settles, so a stalled body is still bounded.
 */
async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  externalSignal: AbortSignal | undefined,
  read: ReadBody<T>
): Promise<T> {
  if (externalSignal?.aborted) {
    throw new CancellationError();
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onExternalAbort = () => controller.abort();
  externalSignal?.addEventListener("abort", onExternalAbort, { once: true });

  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(new CancellationError()),
      { once: true }
    );
  });

  try {
    return await Promise.race([
      fetch(url, { ...init, signal: controller.signal }).then(read),
      aborted,
    ]);
  } catch (error) {
    if (controller.signal.aborted) {
      if (externalSignal?.aborted) {
        throw new CancellationError();
      }
      throw new NetworkError(`Request timed out after ${timeoutMs}ms`, {
        cause: error,
      });
    }
    throw new NetworkError(`Failed to reach GitHub: ${getErrorMessage(error)}`, {
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
    externalSignal?.removeEventListener("abort", onExternalAbort);
  }
}

function request<T>(path: string, options: RequestOptions, read: ReadBody<T>) {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": "modgate",
  };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  const url = `${options.apiBaseUrl.replace(/\/+$/, "")}${path}`;
  return fetchWithTimeout(
    url,
    { headers },
    options.timeoutMs,
    options.signal,
    read
  );
}

function isRateLimited(response: Response): boolean {
  if (response.status === 429) return true;
  return (
    response.status === 403 &&
    response.headers.get("x-ratelimit-remaining") === "0"
  );
}

function readStringField(body: unknown, field: string): string | null {
  if (body && typeof body === "object" && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === "string" ? value : null;
  }
  return null;
}

function fetchLatestRelease(
  owner: string,
  repo: string,
  options: RequestOptions
): Promise<string | null> {
  return request(
    GITHUB_ENDPOINTS.latestRelease(owner, repo),
    options,
    async (response) => {
      if (!response.ok) {
        return null;
      }
      return readStringField(await response.json(), "tag_name");
    }
  );
}

type RepositoryOutcome = Omit<LivenessResult, "name" | "url" | "latestRelease">;

async function readRepository(response: Response): Promise<RepositoryOutcome> {
  if (response.status === 404) {
    return { status: "missing", message: "Repository not found" };
  }

  if (isRateLimited(response)) {
    return { status: "rate-limited", message: "GitHub API rate limit exceeded" };
  }

  if (!response.ok) {
    return {
      status: "error",
      message: `GitHub returned ${response.status} ${response.statusText}`.trim(),
    };
  }

  return {
    status: "ok",
    platformDescription: readStringField(await response.json(), "description"),
  };
}

/**
 * Checks a single entry against the GitHub API.
 *
 * @throws CancellationError when the signal aborts; every other failure is
 * reported in the result
 */
export async function checkRepository(
  entry: RegistryEntry,
  options: CheckOptions = {}
): Promise<LivenessResult> {
  const requestOptions: RequestOptions = {
    apiBaseUrl: options.apiBaseUrl ?? DEFAULT_API_BASE_URL,
    timeoutMs: options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS,
    token: options.token,
    signal: options.signal,
  };
  const base = { name: entry.name, url: entry.url };

  const ref = parseRepositoryName(entry.name);
  if (!ref) {
    return {
      ...base,
      status: "error",
      message: `Invalid repository name "${entry.name}"`,
    };
  }

  try {
    const outcome = await request(
      GITHUB_ENDPOINTS.repo(ref.owner, ref.repo),
      requestOptions,
      readRepository
    );
    if (outcome.status !== "ok") {
      return { ...base, ...outcome };
    }

    const latestRelease = await fetchLatestRelease(
      ref.owner,
      ref.repo,
      requestOptions
    );

    return { ...base, ...outcome, latestRelease };
  } catch (error) {
    if (error instanceof CancellationError) {
      throw error;
    }
    return { ...base, status: "error", message: getErrorMessage(error) };
  }
}

/**
 * Checks every entry with bounded concurrency. Results keep registry order.
 */
export async function checkRepositories(
  entries: readonly RegistryEntry[],
  options: CheckOptions = {}
): Promise<LivenessResult[]> {
  const concurrency = Math.max(
    1,
    options.concurrency ?? DEFAULT_CHECK_CONCURRENCY
  );
  const results = new Array<LivenessResult>(entries.length);
  let nextIndex = 0;
  let done = 0;

  async function worker() {
    while (nextIndex < entries.length) {
      const index = nextIndex++;
      const entry = entries[index];
      if (!entry) continue;
      const result = await checkRepository(entry, options);
      results[index] = result;
      done++;
      options.onResult?.(result, done, entries.length);
    }
  }

  const workers = Array.from(
    { length: Math.min(concurrency, entries.length) },
    () => worker()
  );
  await Promise.all(workers);

  return results;
}
