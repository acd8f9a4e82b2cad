import { VERDICT_JSON_SCHEMA } from "./ai-parsing.js";
import type { ModelInvoker, StatusCallback } from "./ai/contracts.js";
import type { ModelProfile, SentinelConfig } from "./config.js";
import { fileInventory } from "./diff/contracts.js";
import type { DiffProvider } from "./diff/contracts.js";
import { summarizeDiff } from "./diff/summarizer.js";
import { ConfigError, throwIfCancelled } from "./errors.js";
import { AlignmentJudge } from "./judge/alignment-judge.js";
import type { JudgeTransition, TransitionObserver } from "./judge/alignment-judge.js";
import { assemblePrompt, planSections } from "./prompt/assembler.js";
import { aggregateVerdict, renderReport } from "./report.js";
import type { DocumentStore } from "./retrieval/contracts.js";
import { HybridRetriever, buildRetrievalQuery } from "./retrieval/hybrid-retriever.js";
import { TokenBudgetManager } from "./token-budget.js";
import type { AlignmentVerdict, Budget, DecodingMode, RetrievalSource, WorkflowSpec } from "./types.js";
import { parseWorkflows } from "./workflows/parser.js";

const NO_DESIGN_PATTERN = /no approved design/i;
const NO_DESIGN_NOTE = "No approved design document was found for this project.";
const RETRIEVAL_UNAVAILABLE_NOTE = "Design evidence was unavailable, so approval is required.";
const RETRIEVAL_SOURCE_COUNT = 3;

export interface ScopeCheckDependencies {
  diffProvider: DiffProvider;
  store: DocumentStore;
  /** Not needed for dry runs. */
  invoker?: ModelInvoker | undefined;
  loadWorkflows?: (repoDir: string) => WorkflowSpec[] | Promise<WorkflowSpec[]>;
}

export interface ScopeCheckRequest {
  repoDir: string;
  base: string;
  head: string;
  projectId: string;
  description?: string | undefined;
  config: SentinelConfig;
  profile: ModelProfile;
  dryRun?: boolean | undefined;
  signal?: AbortSignal | undefined;
  onStatus?: StatusCallback | undefined;
  onTransition?: TransitionObserver | undefined;
}

export interface RetrievalStats {
  candidates: number;
  used: number;
  dropped: number;
  degradedSources: RetrievalSource[];
}

interface CheckContext {
  profile: ModelProfile["name"];
  budget: Budget;
  retrieval: RetrievalStats;
}

export type ScopeCheckResult =
  | ({ kind: "dry-run"; prompt: string; decoding: DecodingMode; budgetSummary: string } & CheckContext)
  | ({
      kind: "verdict";
      verdict: AlignmentVerdict;
      report: string;
      attempts: number;
      repairs: number;
      transitions: JudgeTransition[];
    } & CheckContext);

function withNote(verdict: AlignmentVerdict, note: string): AlignmentVerdict {
  return Object.freeze({ ...verdict, summary: `${verdict.summary} ${note}`.trim() });
}

function withRetrievalNotes(
  verdict: AlignmentVerdict,
  evidenceCount: number,
  degraded: readonly RetrievalSource[]
): AlignmentVerdict {
  if (degraded.length >= RETRIEVAL_SOURCE_COUNT) return withNote(verdict, RETRIEVAL_UNAVAILABLE_NOTE);
  // Empty results from a degraded retrieval do not show that no design exists.
  if (evidenceCount > 0 || degraded.length > 0 || NO_DESIGN_PATTERN.test(verdict.summary)) return verdict;
  return withNote(verdict, NO_DESIGN_NOTE);
}

/**
 * One scope check: diff and workflow parsing start together, retrieval starts once the change set
 * is known, and the prompt is assembled after both the summary and the evidence are in.
 * Nothing is emitted before a terminal state; cancellation rejects with `CheckCancelledError`.
 */
export async function runScopeCheck(deps: ScopeCheckDependencies, request: ScopeCheckRequest): Promise<ScopeCheckResult> {
  const { config, profile, signal, onStatus } = request;
  throwIfCancelled(signal);
  if (!request.dryRun && !deps.invoker) {
    throw new ConfigError("No model provider is configured for this check.");
  }

  const loadWorkflows = deps.loadWorkflows ?? parseWorkflows;
  const retriever = new HybridRetriever({
    store: deps.store,
    weights: config.retrieval.weights,
    topK: profile.retrievalTopK,
    maxHops: config.retrieval.maxHops,
    relationalLimit: config.retrieval.relationalLimit
  });

  onStatus?.(`Computing diff ${request.base}...${request.head}`);
  const changeSetPromise = deps.diffProvider.getChangeSet(request.repoDir, request.base, request.head, signal);
  const workflowsPromise = Promise.resolve().then(() => loadWorkflows(request.repoDir));
  const retrievalPromise = changeSetPromise.then((changeSet) => {
    onStatus?.(`Retrieving design evidence for project ${request.projectId}`);
    return retriever.retrieve(buildRetrievalQuery(changeSet, request.projectId, request.description), signal);
  });
  const summaryPromise = Promise.all([changeSetPromise, workflowsPromise]).then(([changeSet, workflows]) =>
    summarizeDiff(changeSet, workflows, config.summarizer)
  );

  const [changeSet, summary, retrieval] = await Promise.all([changeSetPromise, summaryPromise, retrievalPromise]);
  throwIfCancelled(signal);
  if (retrieval.degradedSources.length) {
    onStatus?.(`Retrieval degraded: ${retrieval.degradedSources.join(", ")} unavailable`);
  }

  const manager = TokenBudgetManager.forProfile(profile);
  const inputs = {
    summary,
    evidence: retrieval.chunks,
    schema: VERDICT_JSON_SCHEMA,
    degradedSources: retrieval.degradedSources
  };
  const budget = manager.allocate(planSections(inputs, manager));
  const assembled = assemblePrompt(inputs, budget, manager);
  manager.commit(budget, assembled.usage);

  const context: CheckContext = {
    profile: profile.name,
    budget,
    retrieval: {
      candidates: retrieval.chunks.length,
      used: assembled.evidenceKept.length,
      dropped: assembled.evidenceDropped,
      degradedSources: retrieval.degradedSources
    }
  };

  if (request.dryRun || !deps.invoker) {
    return {
      kind: "dry-run",
      prompt: assembled.prompt,
      decoding: assembled.decoding,
      budgetSummary: manager.describe(budget),
      ...context
    };
  }

  onStatus?.(`Judging scope alignment with ${deps.invoker.label}`);
  const judge = new AlignmentJudge({
    invoker: deps.invoker,
    manager,
    maxRetries: config.maxRetries,
    ...(request.onTransition ? { observer: request.onTransition } : {})
  });
  const outcome = await judge.judge({
    prompt: assembled.prompt,
    decoding: assembled.decoding,
    schema: VERDICT_JSON_SCHEMA,
    inventory: fileInventory(changeSet),
    signal
  });
  throwIfCancelled(signal);

  const accepted = withRetrievalNotes(outcome.verdict, retrieval.chunks.length, retrieval.degradedSources);
  const verdict = aggregateVerdict(accepted, config.approvalThreshold, {
    requireApproval: retrieval.degradedSources.length >= RETRIEVAL_SOURCE_COUNT
  });
  return {
    kind: "verdict",
    verdict,
    report: renderReport(verdict, { degradedSources: retrieval.degradedSources }),
    attempts: outcome.attempts,
    repairs: outcome.repairs,
    transitions: outcome.transitions,
    ...context
  };
}
