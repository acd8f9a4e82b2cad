export const VIOLATION_KINDS = [
  "scope_creep",
  "missing_feature_flag",
  "undocumented_dependency",
  "missing_test_coverage",
  "other"
] as const;

export const SEVERITIES = ["critical", "warning", "info"] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];
export type Severity = (typeof SEVERITIES)[number];

export interface Violation {
  readonly kind: ViolationKind;
  readonly severity: Severity;
  readonly filePath: string | null;
  readonly description: string;
  readonly recommendation: string;
}

export interface AlignmentVerdict {
  readonly alignmentScore: number;
  readonly violations: readonly Violation[];
  readonly summary: string;
  readonly approvalRequired: boolean;
}
