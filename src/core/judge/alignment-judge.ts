import { parseVerdictOutput } from "../ai-parsing.js";
import type { VerdictWire } from "../ai-parsing.js";
import type { InvocationErrorKind, InvocationRequest, InvocationResult, ModelInvoker } from "../ai/contracts.js";
import { AnalysisUnavailableError, CheckCancelledError, throwIfCancelled } from "../errors.js";
import { buildRepairPrompt } from "../prompt/assembler.js";
import type { TokenBudgetManager } from "../token-budget.js";
import type { AlignmentVerdict, DecodingMode, Violation } from "../types.js";

export type JudgeState = "BUILDING" | "INVOKING" | "VALIDATING" | "REPAIRING" | "ACCEPTED" | "FAILED";

export interface JudgeTransition {
  from: JudgeState;
  to: JudgeState;
  /** 1-based model invocation the transition belongs to. */
  attempt: number;
  reason?: string;
}

export type TransitionObserver = (transition: JudgeTransition) => void;

export const DEFAULT_MAX_RETRIES = 2;

const NON_RECOVERABLE: ReadonlySet<InvocationErrorKind> = new Set(["quota_exceeded", "invalid_credentials"]);

export interface AlignmentJudgeOptions {
  invoker: ModelInvoker;
  manager: TokenBudgetManager;
  maxRetries?: number;
  observer?: TransitionObserver;
}

export interface JudgeRequest {
  prompt: string;
  decoding: DecodingMode;
  schema: unknown;
  inventory: ReadonlySet<string>;
  signal?: AbortSignal | undefined;
}

interface JudgeStats {
  attempts: number;
  repairs: number;
  transitions: JudgeTransition[];
}

export type JudgeOutcome =
  | ({ state: "ACCEPTED"; verdict: AlignmentVerdict } & JudgeStats)
  | ({ state: "FAILED"; reason: string; nonRecoverable: boolean } & JudgeStats);

type Validation = { ok: true; verdict: AlignmentVerdict } | { ok: false; problems: string[] };

export function normalizeViolationPath(path: string | null): string | null {
  if (path === null) return null;
  const trimmed = path.trim().replace(/^\.\//, "");
  return trimmed || null;
}

function toVerdict(wire: VerdictWire): AlignmentVerdict {
  const violations: Violation[] = wire.violations.map((violation) =>
    Object.freeze({
      kind: violation.kind,
      severity: violation.severity,
      filePath: normalizeViolationPath(violation.file_path),
      description: violation.description.trim(),
      recommendation: violation.recommendation.trim()
    })
  );
  return Object.freeze({
    alignmentScore: wire.alignment_score,
    violations: Object.freeze(violations),
    summary: wire.summary.trim(),
    approvalRequired: wire.approval_required ?? false
  });
}

/** Schema, score range and file-inventory checks on one raw model response. */
export function validateVerdictOutput(raw: string, inventory: ReadonlySet<string>): Validation {
  const parsed = parseVerdictOutput(raw);
  if (!parsed.ok) return { ok: false, problems: parsed.issues };

  const verdict = toVerdict(parsed.data);
  const problems: string[] = [];
  if (!Number.isFinite(verdict.alignmentScore) || verdict.alignmentScore < 0 || verdict.alignmentScore > 1) {
    problems.push(`alignment_score ${verdict.alignmentScore} is outside [0, 1]`);
  }
  verdict.violations.forEach((violation, index) => {
    if (violation.filePath !== null && !inventory.has(violation.filePath)) {
      problems.push(`violations.${index}.file_path "${violation.filePath}" is not in the changed-file list`);
    }
  });
  return problems.length ? { ok: false, problems } : { ok: true, verdict };
}

/**
 * Invokes the model and validates its verdict as an explicit state machine:
 * BUILDING -> INVOKING -> VALIDATING -> ACCEPTED | REPAIRING | FAILED, with REPAIRING -> INVOKING
 * at most `maxRetries` times. One invocation is in flight at a time.
 */
export class AlignmentJudge {
  private readonly invoker: ModelInvoker;
  private readonly manager: TokenBudgetManager;
  private readonly maxRetries: number;
  private readonly observer: TransitionObserver | undefined;

  constructor(options: AlignmentJudgeOptions) {
    this.invoker = options.invoker;
    this.manager = options.manager;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.observer = options.observer;
  }

  // A rejected invocation is a failed response, so the machine still moves through VALIDATING.
  private async invoke(request: InvocationRequest): Promise<InvocationResult> {
    try {
      return await this.invoker.invoke(request);
    } catch (error) {
      if (error instanceof CheckCancelledError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: { kind: "unknown", message } };
    }
  }

  async run(request: JudgeRequest): Promise<JudgeOutcome> {
    const transitions: JudgeTransition[] = [];
    let state: JudgeState = "BUILDING";
    let attempts = 0;
    let repairs = 0;

    const moveTo = (to: JudgeState, reason?: string): void => {
      const transition: JudgeTransition = { from: state, to, attempt: Math.max(1, attempts), ...(reason ? { reason } : {}) };
      transitions.push(transition);
      this.observer?.(transition);
      state = to;
    };
    const stats = (): JudgeStats => ({ attempts, repairs, transitions });

    let prompt = request.prompt;
    for (;;) {
      throwIfCancelled(request.signal);
      attempts += 1;
      moveTo("INVOKING");

      const result = await this.invoke({
        prompt,
        schema: request.schema,
        decoding: request.decoding,
        signal: request.signal
      });
      throwIfCancelled(request.signal);
      moveTo("VALIDATING");

      let problems: string[];
      let previousOutput: string | null = null;
      if (!result.ok) {
        const reason = `${result.error.kind}: ${result.error.message}`;
        if (NON_RECOVERABLE.has(result.error.kind)) {
          moveTo("FAILED", reason);
          return { state: "FAILED", reason, nonRecoverable: true, ...stats() };
        }
        problems = [`the model service failed (${reason})`];
      } else {
        const validation = validateVerdictOutput(result.text, request.inventory);
        if (validation.ok) {
          moveTo("ACCEPTED");
          return { state: "ACCEPTED", verdict: validation.verdict, ...stats() };
        }
        problems = validation.problems;
        previousOutput = result.text;
      }

      const reason = problems.join("; ");
      if (repairs >= this.maxRetries) {
        moveTo("FAILED", reason);
        return { state: "FAILED", reason, nonRecoverable: false, ...stats() };
      }

      repairs += 1;
      moveTo("REPAIRING", reason);
      prompt = result.ok ? buildRepairPrompt(request.prompt, previousOutput, problems, this.manager) : request.prompt;
    }
  }

  /** Runs the state machine and turns FAILED into `AnalysisUnavailableError`. */
  async judge(request: JudgeRequest): Promise<Extract<JudgeOutcome, { state: "ACCEPTED" }>> {
    const outcome = await this.run(request);
    if (outcome.state === "ACCEPTED") return outcome;
    throw new AnalysisUnavailableError(
      outcome.nonRecoverable
        ? `Model service (${this.invoker.label}) failed: ${outcome.reason}`
        : `No valid verdict from ${this.invoker.label} after ${outcome.attempts} attempt(s): ${outcome.reason}`,
      { details: { attempts: outcome.attempts, repairs: outcome.repairs, reason: outcome.reason } }
    );
  }
}
