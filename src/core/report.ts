import type { AlignmentVerdict, RetrievalSource, Severity, Violation } from "./types.js";
import { SEVERITIES } from "./types.js";
import { compareStrings } from "./text.js";

export const DEFAULT_APPROVAL_THRESHOLD = 0.6;

export interface AggregateOptions {
  /** Forces `approvalRequired`, whatever the score. */
  requireApproval?: boolean;
}

export interface ReportOptions {
  degradedSources?: readonly RetrievalSource[];
}

function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

function comparePaths(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return compareStrings(a, b);
}

export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      comparePaths(a.filePath, b.filePath) ||
      compareStrings(a.kind, b.kind) ||
      compareStrings(a.description, b.description)
  );
}

/** Applies the approval rule: any critical violation, or a score under the threshold. */
export function aggregateVerdict(
  verdict: AlignmentVerdict,
  approvalThreshold = DEFAULT_APPROVAL_THRESHOLD,
  options: AggregateOptions = {}
): AlignmentVerdict {
  const hasCritical = verdict.violations.some((violation) => violation.severity === "critical");
  return Object.freeze({
    alignmentScore: verdict.alignmentScore,
    violations: Object.freeze(sortViolations(verdict.violations)),
    summary: verdict.summary,
    approvalRequired: options.requireApproval === true || hasCritical || verdict.alignmentScore < approvalThreshold
  });
}

function renderViolation(violation: Violation): string[] {
  const location = violation.filePath ?? "project-wide";
  return [
    `- [${violation.severity.toUpperCase()}] **${violation.kind}** in \`${location}\`: ${violation.description}`,
    `  - **Recommendation:** ${violation.recommendation}`
  ];
}

export function renderReport(verdict: AlignmentVerdict, options: ReportOptions = {}): string {
  const lines = ["## Scope Check Report", `**Alignment Score:** ${verdict.alignmentScore.toFixed(2)}`];
  if (options.degradedSources?.length) {
    lines.push(`**Confidence:** low (retrieval degraded: ${options.degradedSources.join(", ")})`);
  }
  lines.push("### Violations Found");
  const violations = sortViolations(verdict.violations);
  if (violations.length) {
    lines.push(...violations.flatMap(renderViolation));
  } else {
    lines.push("- None");
  }
  lines.push(`**Approval required:** ${verdict.approvalRequired}`, `**Summary:** ${verdict.summary}`);
  return `${lines.join("\n")}\n`;
}
