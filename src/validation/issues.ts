import type { IssueCode, IssueField, IssueSeverity, ValidationIssue } from "../shared/types.js";

/** Ordered error and warning sequences for one case */
export interface IssueLog {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export function createIssueLog(): IssueLog {
  return { errors: [], warnings: [] };
}

export function makeIssue(
  code: IssueCode,
  severity: IssueSeverity,
  message: string,
  markerCanonical: string | null = null,
  field: IssueField | null = null,
): ValidationIssue {
  return { code, message, severity, marker_canonical: markerCanonical, field };
}

/** Append an issue to the sequence matching its severity. */
export function recordIssue(log: IssueLog, issue: ValidationIssue): void {
  if (issue.severity === "error") {
    log.errors.push(issue);
  } else {
    log.warnings.push(issue);
  }
}
