import { REGISTRY_INDENT } from "../constants";
import { RegistryFormatError } from "../errors";
import { parseJson } from "../utils/json";
import { formatViolation } from "./format";
import { expectedRepositoryUrl, normalizeNameKey } from "./name";
import type { RegistryEntry } from "./types";
import { type ValidateOptions, validateRegistry } from "./validate";

/**
 * Label shown to players: `custom_name`, or the last segment of the URL.
 */
export function getDisplayName(entry: RegistryEntry): string {
  const customName = entry.custom_name.trim();
  if (customName.length > 0) return customName;
  const segments = entry.url.replace(/\/+$/, "").split("/");
  return segments[segments.length - 1] ?? entry.name;
}

export type CreateEntryInput = {
  name: string;
  customName: string;
  description?: string;
  hostBaseUrl?: string;
};

export function createRegistryEntry(input: CreateEntryInput): RegistryEntry {
  const name = input.name.trim();
  const description = input.description?.trim();

  return {
    name,
    custom_name: input.customName.trim(),
    ...(description ? { description } : {}),
    url: expectedRepositoryUrl(name, input.hostBaseUrl),
  };
}

export function serializeRegistry(records: readonly unknown[]): string {
  return `${JSON.stringify(records, null, REGISTRY_INDENT)}\n`;
}

/**
 * Parses an accepted registry, throwing when it has error-level violations.
 */
export function readRegistry(
  text: string,
  options: ValidateOptions = {}
): RegistryEntry[] {
  const report = validateRegistry(text, options);
  if (!report.isAcceptable) {
    const details = report.violations
      .filter((v) => v.severity === "error")
      .map(formatViolation);
    throw new RegistryFormatError("Registry is not valid", details);
  }
  return report.entries;
}

export type AppendResult = {
  text: string;
  entry: RegistryEntry;
  entryCount: number;
};

/**
 * Appends an entry to registry text, keeping existing records untouched.
 * The new record follows the file's indentation. The current and resulting
 * documents must both validate.
 */
export function appendRegistryEntry(
  text: string,
  entry: RegistryEntry,
  options: ValidateOptions = {}
): AppendResult {
  const current = readRegistry(text, options);

  const key = normalizeNameKey(entry.name);
  const existing = current.find((e) => normalizeNameKey(e.name) === key);
  if (existing) {
    throw new RegistryFormatError(
      `"${entry.name}" is already listed as "${existing.name}"`
    );
  }

  const parsed = parseJson(text);
  const recordCount =
    parsed.ok && Array.isArray(parsed.value) ? parsed.value.length : 0;

  const nextText =
    recordCount === 0 ? serializeRegistry([entry]) : insertLastRecord(text, entry);
  const next = validateRegistry(nextText, options);
  if (!next.isAcceptable) {
    const details = next.violations
      .filter((v) => v.severity === "error")
      .map(formatViolation);
    throw new RegistryFormatError(`Entry "${entry.name}" is not valid`, details);
  }

  return { text: nextText, entry, entryCount: recordCount + 1 };
}

/** Indentation of the first indented line, if any */
function detectIndent(text: string): string | null {
  const match = /^[ \t]+(?=\S)/m.exec(text);
  return match ? match[0] : null;
}

/**
 * Splices a record in before the closing bracket of a non-empty array,
 * leaving the text of earlier records byte-for-byte as it was.
 */
function insertLastRecord(text: string, entry: RegistryEntry): string {
  const closeIndex = text.lastIndexOf("]");
  const head = text.slice(0, closeIndex).trimEnd();
  const indent = detectIndent(text) ?? " ".repeat(REGISTRY_INDENT);
  const record = JSON.stringify(entry, null, indent).replace(/\n/g, `\n${indent}`);
  return `${head},\n${indent}${record}\n${text.slice(closeIndex)}`;
}

