import { readRegistry } from "./entry";
import { diffRegistries } from "./diff";
import type { ChangeSet, ValidationReport } from "./types";
import { type ValidateOptions, validateRegistry } from "./validate";

export type GateResult = {
  /** Candidate report, with change-set warnings appended when a base was given */
  report: ValidationReport;
  /** Null when no base was given or the candidate was rejected */
  changes: ChangeSet | null;
  isAcceptable: boolean;
};

/**
 * Merge gate for a proposed repositories.json.
 *
 * @param candidateText - Proposed file contents
 * @param baseText - Currently accepted contents; must itself be valid
 * @throws RegistryFormatError when the base registry is invalid
 */
export function gateRegistry(
  candidateText: string,
  baseText?: string,
  options: ValidateOptions = {}
): GateResult {
  const report = validateRegistry(candidateText, options);

  if (baseText === undefined || !report.isAcceptable) {
    return { report, changes: null, isAcceptable: report.isAcceptable };
  }

  const base = readRegistry(baseText, options);
  const changes = diffRegistries(base, report.entries);

  return {
    report: {
      ...report,
      violations: [...report.violations, ...changes.warnings],
    },
    changes,
    isAcceptable: report.isAcceptable,
  };
}
