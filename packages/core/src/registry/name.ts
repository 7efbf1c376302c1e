import { DEFAULT_HOST_BASE_URL } from "../constants";
import { REPOSITORY_NAME_REGEX } from "../schemas";

export type RepositoryRef = { owner: string; repo: string };

/**
 * Splits an `{owner}/{repo}` name. Returns null when the name is not in that shape.
 */
export function parseRepositoryName(name: string): RepositoryRef | null {
  if (!REPOSITORY_NAME_REGEX.test(name)) return null;
  const [owner, repo] = name.split("/");
  if (!owner || !repo) return null;
  return { owner, repo };
}

/** Ensures the base ends with exactly one slash */
export function normalizeHostBaseUrl(base: string): string {
  return `${base.replace(/\/+$/, "")}/`;
}

/**
 * The only URL an entry with this name may carry.
 */
export function expectedRepositoryUrl(
  name: string,
  hostBaseUrl: string = DEFAULT_HOST_BASE_URL
): string {
  return `${normalizeHostBaseUrl(hostBaseUrl)}${name}`;
}

/** Repository identifiers on the hosting platform are case-insensitive */
export function normalizeNameKey(name: string): string {
  return name.toLowerCase();
}
