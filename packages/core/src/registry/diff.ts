import { createDiffPreview, type DiffPreviewOptions } from "../utils/diff";
import { normalizeNameKey } from "./name";
import {
  type ChangeSet,
  ERROR_KIND_SEVERITY,
  type EntryModification,
  REGISTRY_FIELDS,
  type Registry,
  type RegistryEntry,
  type RegistryField,
  type Violation,
} from "./types";

function indexByName(registry: Registry) {
  const byName = new Map<string, { entry: RegistryEntry; index: number }>();
  registry.forEach((entry, index) => {
    const key = normalizeNameKey(entry.name);
    if (!byName.has(key)) {
      byName.set(key, { entry, index });
    }
  });
  return byName;
}

export function changedFields(
  before: RegistryEntry,
  after: RegistryEntry
): RegistryField[] {
  return REGISTRY_FIELDS.filter((field) => before[field] !== after[field]);
}

/**
 * Compares two registry snapshots by (case-insensitive) name.
 *
 * Community updates are expected to be additive. Editing or dropping an
 * existing entry is allowed but surfaces as an ExistingEntryModified warning
 * for a reviewer.
 */
export function diffRegistries(
  oldRegistry: Registry,
  newRegistry: Registry
): ChangeSet {
  const previous = indexByName(oldRegistry);
  const next = indexByName(newRegistry);

  const added: RegistryEntry[] = [];
  const modified: EntryModification[] = [];
  let unchanged = 0;

  for (const [key, { entry, index }] of next) {
    const prior = previous.get(key);
    if (!prior) {
      added.push(entry);
      continue;
    }

    const fields = changedFields(prior.entry, entry);
    if (fields.length === 0) {
      unchanged++;
      continue;
    }

    modified.push({
      name: entry.name,
      index,
      previousIndex: prior.index,
      before: prior.entry,
      after: entry,
      changedFields: fields,
    });
  }

  const removed: { entry: RegistryEntry; index: number }[] = [];
  for (const [key, item] of previous) {
    if (!next.has(key)) removed.push(item);
  }

  const warnings: Violation[] = [
    ...modified.map((m) => ({
      recordIndex: m.index,
      kind: "ExistingEntryModified" as const,
      severity: ERROR_KIND_SEVERITY.ExistingEntryModified,
      message: `Existing entry "${m.name}" was modified (${m.changedFields.join(", ")})`,
      field: m.changedFields.length === 1 ? m.changedFields[0] : undefined,
    })),
    ...removed.map(({ entry, index }) => ({
      recordIndex: null,
      kind: "ExistingEntryModified" as const,
      severity: ERROR_KIND_SEVERITY.ExistingEntryModified,
      message: `Existing entry "${entry.name}" was removed (was at index ${index})`,
    })),
  ];

  return {
    added,
    removed: removed.map(({ entry }) => entry),
    modified,
    unchanged,
    warnings,
    isAdditive: modified.length === 0 && removed.length === 0,
  };
}

/**
 * Unified diff of a modified entry, as pretty-printed JSON.
 */
export function previewModification(
  modification: EntryModification,
  options: DiffPreviewOptions = {}
): string {
  return createDiffPreview(
    `[${modification.index}] ${modification.name}`,
    `${JSON.stringify(modification.before, null, 2)}\n`,
    `${JSON.stringify(modification.after, null, 2)}\n`,
    options
  );
}
