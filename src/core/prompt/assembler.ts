import { BudgetExceededError } from "../errors.js";
import { renderDiffSummaryCore, renderHunkExcerpt } from "../diff/summarizer.js";
import type { DiffSummary } from "../diff/summarizer.js";
import { fitEvidence, renderEvidenceChunk } from "../retrieval/hybrid-retriever.js";
import { estimateTokens } from "../token-budget.js";
import type { TokenBudgetManager } from "../token-budget.js";
import type { Budget, DecodingMode, EvidenceChunk, RetrievalSource, SectionName, SectionRequest } from "../types.js";
import { FEW_SHOT_EXAMPLES, renderFewShotExample } from "./few-shot.js";

const SECTION_SEPARATOR = "\n\n";
const EXCERPTS_HEADING = "Hunk excerpts (most significant first, the rest elided):";
const EVIDENCE_HEADING = "## Approved design evidence (ranked)";
const FEW_SHOT_HEADING = "## Examples";
const REPAIR_OUTPUT_TOKENS = 400;

export const NO_EVIDENCE_NOTICE =
  "No approved design documents were found for this project. Judge the change on its own merits and state in the " +
  "summary that no approved design was found.";

export function degradedEvidenceNotice(sources: readonly RetrievalSource[]): string {
  return (
    `Design evidence could not be retrieved (unavailable: ${sources.join(", ")}). Do not assume the project has no ` +
    "approved design. Judge the change on its own merits and state in the summary that the design could not be checked."
  );
}

const INSTRUCTIONS = [
  "## Instructions",
  "You review a code change against the approved design documents of its project.",
  "Decide whether the change stays within the documented design and report every deviation as a violation.",
  "",
  "Rules:",
  "- alignment_score is a number from 0.0 (unrelated to the design) to 1.0 (fully within it).",
  "- kind is one of: scope_creep, missing_feature_flag, undocumented_dependency, missing_test_coverage, other.",
  "- severity is one of: critical, warning, info. Use critical for work the design rules out.",
  "- file_path must be copied exactly from the changed-file list, or null for project-wide findings.",
  "- Every violation needs a concrete recommendation.",
  "- summary is two or three sentences for a reviewer.",
  "- Base the judgment only on the change summary and the evidence below."
].join("\n");

export interface PromptInputs {
  summary: DiffSummary;
  evidence: readonly EvidenceChunk[];
  schema: unknown;
  /** Sources that failed; with no evidence they change what the prompt tells the model. */
  degradedSources?: readonly RetrievalSource[];
}

export interface AssembledPrompt {
  prompt: string;
  decoding: DecodingMode;
  /** Estimated tokens per section, to be committed against the budget. */
  usage: Partial<Record<SectionName, number>>;
  evidenceKept: EvidenceChunk[];
  evidenceDropped: number;
  excerptsDropped: number;
}

function renderSchemaSection(schema: unknown, decoding: DecodingMode): string {
  const closing =
    decoding === "schema"
      ? "The response is constrained to this schema."
      : "Respond with a single JSON object that matches this schema and nothing else.";
  return ["## Output schema", JSON.stringify(schema, null, 2), closing].join("\n");
}

function joinParts(parts: string[]): string {
  return parts.filter(Boolean).join(SECTION_SEPARATOR);
}

const DIFF_HEADING = "## Change summary";
const EXCERPTS_OVERHEAD = estimateTokens(`${SECTION_SEPARATOR}${EXCERPTS_HEADING}${SECTION_SEPARATOR}`);
const EVIDENCE_OVERHEAD = estimateTokens(`${EVIDENCE_HEADING}${SECTION_SEPARATOR}`);
const FEW_SHOT_OVERHEAD = estimateTokens(`${FEW_SHOT_HEADING}${SECTION_SEPARATOR}`);

function renderDiffHead(summary: DiffSummary): string {
  return joinParts([DIFF_HEADING, renderDiffSummaryCore(summary)]);
}

function renderFewShotBody(): string {
  return joinParts(FEW_SHOT_EXAMPLES.map(renderFewShotExample));
}

// Natural sizes add up the parts the fitters estimate separately, so reserving them never drops content.
function naturalDiffTokens(summary: DiffSummary): number {
  const head = estimateTokens(renderDiffHead(summary));
  if (!summary.excerpts.length) return head;
  return head + EXCERPTS_OVERHEAD + estimateTokens(joinParts(summary.excerpts.map(renderHunkExcerpt)));
}

function emptyEvidenceText(degradedSources: readonly RetrievalSource[] = []): string {
  const notice = degradedSources.length ? degradedEvidenceNotice(degradedSources) : NO_EVIDENCE_NOTICE;
  return joinParts([EVIDENCE_HEADING, notice]);
}

function naturalEvidenceTokens(inputs: PromptInputs): number {
  if (!inputs.evidence.length) return estimateTokens(emptyEvidenceText(inputs.degradedSources));
  return EVIDENCE_OVERHEAD + estimateTokens(joinParts(inputs.evidence.map(renderEvidenceChunk)));
}

function decodingFor(manager: TokenBudgetManager): DecodingMode {
  return manager.constrainedDecoding ? "schema" : "freeform";
}

/** Natural (untrimmed) size of every section, ready for `TokenBudgetManager.allocate`. */
export function planSections(inputs: PromptInputs, manager: TokenBudgetManager): SectionRequest[] {
  return [
    { name: "system_instructions", priority: "fixed", naturalTokens: estimateTokens(INSTRUCTIONS) },
    {
      name: "output_schema",
      priority: "fixed",
      naturalTokens: estimateTokens(renderSchemaSection(inputs.schema, decodingFor(manager)))
    },
    { name: "diff_summary", priority: "high", naturalTokens: naturalDiffTokens(inputs.summary) },
    { name: "retrieved_context", priority: "medium", naturalTokens: naturalEvidenceTokens(inputs) },
    { name: "few_shot_examples", priority: "low", naturalTokens: FEW_SHOT_OVERHEAD + estimateTokens(renderFewShotBody()) }
  ];
}

// The file inventory is never trimmed; only hunk excerpts give way to the budget.
function fitDiffSection(summary: DiffSummary, limit: number, manager: TokenBudgetManager): { text: string; dropped: number } {
  const head = renderDiffHead(summary);
  const headTokens = estimateTokens(head);
  if (headTokens > limit) {
    throw new BudgetExceededError(
      `The changed-file inventory needs ${headTokens} tokens but the diff summary budget is ${limit}.`,
      { details: { section: "diff_summary", tokens: headTokens, reserved: limit } }
    );
  }

  const room = limit - headTokens - EXCERPTS_OVERHEAD;
  const fitted = room > 0 ? manager.fitChunks(summary.excerpts, room, renderHunkExcerpt) : null;
  if (!fitted || !fitted.kept.length) return { text: head, dropped: summary.excerpts.length };
  return { text: joinParts([head, EXCERPTS_HEADING, fitted.text]), dropped: fitted.dropped };
}

function fitEvidenceSection(
  inputs: PromptInputs,
  limit: number,
  manager: TokenBudgetManager
): { text: string; kept: EvidenceChunk[] } {
  if (!inputs.evidence.length) return { text: manager.fit(emptyEvidenceText(inputs.degradedSources), limit), kept: [] };

  const fitted = fitEvidence(inputs.evidence, limit - EVIDENCE_OVERHEAD, manager);
  if (!fitted.chunks.length) return { text: "", kept: [] };
  return { text: joinParts([EVIDENCE_HEADING, fitted.text]), kept: fitted.chunks };
}

function fitFewShotSection(limit: number, manager: TokenBudgetManager): string {
  if (!manager.fewShotEnabled || limit <= 0) return "";
  const fitted = manager.fitChunks([...FEW_SHOT_EXAMPLES.entries()], limit - FEW_SHOT_OVERHEAD, ([index, example]) =>
    renderFewShotExample(example, index)
  );
  return fitted.kept.length ? joinParts([FEW_SHOT_HEADING, fitted.text]) : "";
}

/**
 * Builds the judge prompt in a fixed section order: instructions, schema, diff summary, evidence,
 * few-shot examples. Pure: identical inputs and budget give an identical prompt.
 */
export function assemblePrompt(inputs: PromptInputs, budget: Budget, manager: TokenBudgetManager): AssembledPrompt {
  const decoding = decodingFor(manager);
  const reserved = (name: SectionName): number => budget.reserved[name] ?? 0;

  const schemaText = renderSchemaSection(inputs.schema, decoding);
  const diff = fitDiffSection(inputs.summary, reserved("diff_summary"), manager);
  const evidence = fitEvidenceSection(inputs, reserved("retrieved_context"), manager);
  const fewShot = fitFewShotSection(reserved("few_shot_examples"), manager);

  const sections: Array<[SectionName, string]> = [
    ["system_instructions", INSTRUCTIONS],
    ["output_schema", schemaText],
    ["diff_summary", diff.text],
    ["retrieved_context", evidence.text],
    ["few_shot_examples", fewShot]
  ];

  const usage: Partial<Record<SectionName, number>> = {};
  for (const [name, text] of sections) usage[name] = estimateTokens(text);

  return {
    prompt: joinParts(sections.map(([, text]) => text)),
    decoding,
    usage,
    evidenceKept: evidence.kept,
    evidenceDropped: inputs.evidence.length - evidence.kept.length,
    excerptsDropped: diff.dropped
  };
}

export function buildRepairPrompt(
  basePrompt: string,
  previousOutput: string | null,
  problems: readonly string[],
  manager: TokenBudgetManager
): string {
  const lines = ["## Correction required", "Your previous response was rejected:", ...problems.map((problem) => `- ${problem}`)];
  if (previousOutput?.trim()) {
    lines.push("", "Previous response:", "```", manager.fit(previousOutput.trim(), REPAIR_OUTPUT_TOKENS), "```");
  }
  lines.push(
    "",
    "Return one corrected JSON object that satisfies the output schema.",
    "Use only file paths from the changed-file list, or null."
  );
  return joinParts([basePrompt, lines.join("\n")]);
}
