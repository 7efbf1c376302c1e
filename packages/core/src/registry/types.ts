import type { z } from "zod";
import type { registryEntrySchema } from "../schemas";

/** One community project listed in repositories.json */
export type RegistryEntry = z.infer<typeof registryEntrySchema>;

/** Ordered list of entries (order reflects merge history, not lookup) */
export type Registry = RegistryEntry[];

/** Fields an entry may carry, in the order they are checked */
export const REGISTRY_FIELDS = [
  "name",
  "custom_name",
  "description",
  "url",
] as const;

export type RegistryField = (typeof REGISTRY_FIELDS)[number];

export const REQUIRED_FIELDS: readonly RegistryField[] = [
  "name",
  "custom_name",
  "url",
];

// =============================================================================
// Violations
// =============================================================================

export const ERROR_KINDS = [
  "MalformedDocument",
  "MissingField",
  "WrongType",
  "InvalidNameFormat",
  "UrlNameMismatch",
  "DuplicateEntry",
  "UnknownField",
  "ExistingEntryModified",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type Severity = "error" | "warning";

/** Warnings are reported but never block a merge */
export const ERROR_KIND_SEVERITY: Record<ErrorKind, Severity> = {
  MalformedDocument: "error",
  MissingField: "error",
  WrongType: "error",
  InvalidNameFormat: "error",
  UrlNameMismatch: "error",
  DuplicateEntry: "error",
  UnknownField: "warning",
  ExistingEntryModified: "warning",
};

export type Violation = {
  /** Index of the record in the document, null for document-level problems */
  recordIndex: number | null;
  kind: ErrorKind;
  severity: Severity;
  message: string;
  /** Field the violation is about, if any */
  field?: string;
  /** 1-based position of a syntax error */
  line?: number;
  column?: number;
};

export type ValidationReport = {
  /** Ordered by record index, document-level first */
  violations: Violation[];
  /** True when no error-level violation was found */
  isAcceptable: boolean;
  /** Number of top-level records in the document */
  entryCount: number;
  /** Records that passed every error-level check, in document order */
  entries: RegistryEntry[];
};

// =============================================================================
// Changes
// =============================================================================

export type EntryModification = {
  /** Name as it appears in the new registry */
  name: string;
  /** Index in the new registry */
  index: number;
  /** Index in the old registry */
  previousIndex: number;
  before: RegistryEntry;
  after: RegistryEntry;
  changedFields: RegistryField[];
};

export type ChangeSet = {
  added: RegistryEntry[];
  removed: RegistryEntry[];
  modified: EntryModification[];
  /** Entries present and identical in both registries */
  unchanged: number;
  /** One ExistingEntryModified warning per modified or removed entry */
  warnings: Violation[];
  /** True when the change only appends entries */
  isAdditive: boolean;
};
