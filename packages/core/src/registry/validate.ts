import type { z } from "zod";
import { DEFAULT_HOST_BASE_URL } from "../constants";
import {
  customNameSchema,
  repositoryNameSchema,
  repositoryUrlSchema,
} from "../schemas";
import { describeJsonType, isJsonObject, parseJson } from "../utils/json";
import { expectedRepositoryUrl, normalizeNameKey } from "./name";
import {
  ERROR_KIND_SEVERITY,
  type ErrorKind,
  REGISTRY_FIELDS,
  REQUIRED_FIELDS,
  type RegistryEntry,
  type ValidationReport,
  type Violation,
} from "./types";

export type ValidateOptions = {
  /** Base every entry URL is derived from (default: https://github.com/) */
  hostBaseUrl?: string;
};

const KNOWN_FIELDS = new Set<string>(REGISTRY_FIELDS);

function violation(
  recordIndex: number | null,
  kind: ErrorKind,
  message: string,
  extra: Pick<Violation, "field" | "line" | "column"> = {}
): Violation {
  return {
    recordIndex,
    kind,
    severity: ERROR_KIND_SEVERITY[kind],
    message,
    ...extra,
  };
}

function firstIssue(schema: z.ZodType, value: unknown): string | undefined {
  const result = schema.safeParse(value);
  if (!result.success) return result.error.issues[0]?.message;
  return;
}

/**
 * Validates the text of a candidate repositories.json.
 *
 * Syntax errors short-circuit into a single MalformedDocument violation.
 * Every other check runs to completion so a contributor sees all problems
 * in one pass.
 */
export function validateRegistry(
  candidateText: string,
  options: ValidateOptions = {}
): ValidationReport {
  const hostBaseUrl = options.hostBaseUrl ?? DEFAULT_HOST_BASE_URL;
  const parsed = parseJson(candidateText);

  if (!parsed.ok) {
    const location =
      parsed.line !== undefined
        ? { line: parsed.line, column: parsed.column }
        : {};
    return buildReport(
      [
        violation(
          null,
          "MalformedDocument",
          `Invalid JSON: ${parsed.message}`,
          location
        ),
      ],
      0,
      []
    );
  }

  if (!Array.isArray(parsed.value)) {
    return buildReport(
      [
        violation(
          null,
          "WrongType",
          `Registry must be an array of entries, got ${describeJsonType(parsed.value)}`
        ),
      ],
      0,
      []
    );
  }

  const records: unknown[] = parsed.value;
  const violations: Violation[] = [];
  const entries: RegistryEntry[] = [];
  const firstIndexByName = new Map<string, number>();

  records.forEach((record, index) => {
    const found = validateRecord(record, index, hostBaseUrl, firstIndexByName);
    violations.push(...found);

    const hasErrors = found.some((v) => v.severity === "error");
    if (!hasErrors && isJsonObject(record)) {
      const entry = toEntry(record);
      if (entry) entries.push(entry);
    }
  });

  return buildReport(violations, records.length, entries);
}

function buildReport(
  violations: Violation[],
  entryCount: number,
  entries: RegistryEntry[]
): ValidationReport {
  return {
    violations,
    isAcceptable: !violations.some((v) => v.severity === "error"),
    entryCount,
    entries,
  };
}

function validateRecord(
  record: unknown,
  index: number,
  hostBaseUrl: string,
  firstIndexByName: Map<string, number>
): Violation[] {
  if (!isJsonObject(record)) {
    return [
      violation(
        index,
        "WrongType",
        `Entry must be an object, got ${describeJsonType(record)}`
      ),
    ];
  }

  const violations: Violation[] = [];

  // Presence and type
  for (const field of REGISTRY_FIELDS) {
    const value = record[field];

    if (value === undefined) {
      if (REQUIRED_FIELDS.includes(field)) {
        violations.push(
          violation(index, "MissingField", `Missing required field "${field}"`, {
            field,
          })
        );
      }
      continue;
    }

    if (typeof value !== "string") {
      violations.push(
        violation(
          index,
          "WrongType",
          `Field "${field}" must be a string, got ${describeJsonType(value)}`,
          { field }
        )
      );
      continue;
    }

    if (field === "custom_name") {
      const issue = firstIssue(customNameSchema, value);
      if (issue) {
        violations.push(violation(index, "MissingField", issue, { field }));
      }
    }
  }

  const { name, url } = record;

  // Name shape
  if (typeof name === "string") {
    const issue = firstIssue(repositoryNameSchema, name);
    if (issue) {
      violations.push(
        violation(
          index,
          "InvalidNameFormat",
          `Invalid name "${name}": ${issue}`,
          { field: "name" }
        )
      );
    }
  }

  // URL consistency
  if (typeof name === "string" && typeof url === "string") {
    const expected = expectedRepositoryUrl(name, hostBaseUrl);
    if (url !== expected) {
      const wellFormed = firstIssue(repositoryUrlSchema, url) === undefined;
      const problem = wellFormed
        ? `does not match name "${name}"`
        : "is not a well-formed URL";
      violations.push(
        violation(
          index,
          "UrlNameMismatch",
          `url "${url}" ${problem} (expected "${expected}")`,
          { field: "url" }
        )
      );
    }
  }

  // Uniqueness
  if (typeof name === "string") {
    const key = normalizeNameKey(name);
    const firstIndex = firstIndexByName.get(key);
    if (firstIndex === undefined) {
      firstIndexByName.set(key, index);
    } else {
      violations.push(
        violation(
          index,
          "DuplicateEntry",
          `Duplicate name "${name}" (already listed at index ${firstIndex})`,
          { field: "name" }
        )
      );
    }
  }

  // Typo guard
  for (const key of Object.keys(record)) {
    if (!KNOWN_FIELDS.has(key)) {
      violations.push(
        violation(
          index,
          "UnknownField",
          `Unknown field "${key}" (expected one of: ${REGISTRY_FIELDS.join(", ")})`,
          { field: key }
        )
      );
    }
  }

  return violations;
}

function toEntry(record: Record<string, unknown>): RegistryEntry | null {
  const { name, custom_name, description, url } = record;
  if (
    typeof name !== "string" ||
    typeof custom_name !== "string" ||
    typeof url !== "string"
  ) {
    return null;
  }

  return {
    name,
    custom_name,
    ...(typeof description === "string" ? { description } : {}),
    url,
  };
}
