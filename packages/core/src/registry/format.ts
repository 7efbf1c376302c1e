import type { ValidationReport, Violation } from "./types";

/**
 * One report line: `[<index>] <ErrorKind>: <message>`.
 * Document-level violations use `-` as the index.
 */
export function formatViolation(violation: Violation): string {
  const index =
    violation.recordIndex === null ? "-" : String(violation.recordIndex);
  const location =
    violation.line !== undefined
      ? ` (line ${violation.line}${
          violation.column !== undefined ? `, column ${violation.column}` : ""
        })`
      : "";
  return `[${index}] ${violation.kind}: ${violation.message}${location}`;
}

export function formatReport(report: Pick<ValidationReport, "violations">) {
  return report.violations.map(formatViolation).join("\n");
}

export function countBySeverity(violations: readonly Violation[]) {
  let errors = 0;
  let warnings = 0;
  for (const v of violations) {
    if (v.severity === "error") errors++;
    else warnings++;
  }
  return { errors, warnings };
}
