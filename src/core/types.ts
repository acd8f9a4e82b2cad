export type { AiProvider, DecodingMode, ModelProfileName } from "./types/common.js";
export type { BranchMetadata, ChangeKind, ChangeSet, FileChange, Hunk } from "./types/change-set.js";
export type { WorkflowJob, WorkflowSpec } from "./types/workflow.js";
export type { EvidenceChunk, RetrievalResult, RetrievalSource } from "./types/evidence.js";
export type { AlignmentVerdict, Severity, Violation, ViolationKind } from "./types/verdict.js";
export { SEVERITIES, VIOLATION_KINDS } from "./types/verdict.js";
export type { Budget, SectionName, SectionPriority, SectionRequest } from "./types/budget.js";
export { SECTION_NAMES } from "./types/budget.js";
export type { CheckCommandOptions } from "./types/check.js";
export type { InstallHookCommandOptions } from "./types/install-hook.js";
