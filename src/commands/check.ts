import { log, spinner } from "@clack/prompts";

import { CliModelInvoker } from "../core/ai/cli-invoker.js";
import type { ModelInvoker, StatusCallback } from "../core/ai/contracts.js";
import { chooseProvider } from "../core/ai/provider-selection.js";
import type { DiffProvider } from "../core/diff/contracts.js";
import { GitDiffProvider } from "../core/diff/git-provider.js";
import { PatchFileDiffProvider } from "../core/diff/patch-provider.js";
import { ConfigError, InputError } from "../core/errors.js";
import type { JudgeTransition } from "../core/judge/alignment-judge.js";
import { runScopeCheck } from "../core/pipeline.js";
import type { ScopeCheckDependencies, ScopeCheckResult } from "../core/pipeline.js";
import type { DocumentStore } from "../core/retrieval/contracts.js";
import { LocalDocumentStore } from "../core/retrieval/local-store.js";
import type { CheckCommandOptions } from "../core/types.js";

import { prepareCheckWorkflow } from "./check/workflow-setup.js";
import type { PreparedCheckWorkflow } from "./check/workflow-setup.js";

export const EXIT_CODE_APPROVAL_REQUIRED = 3;

const PATCH_BASE_LABEL = "base";
const PATCH_HEAD_LABEL = "head";

/** Seams for tests; production wiring builds each from the prepared workflow. */
export interface CheckCommandOverrides {
  diffProvider?: DiffProvider;
  store?: DocumentStore;
  invoker?: ModelInvoker;
  loadWorkflows?: ScopeCheckDependencies["loadWorkflows"];
  signal?: AbortSignal;
}

async function resolveRefs(
  workflow: PreparedCheckWorkflow,
  signal: AbortSignal
): Promise<{ base: string; head: string }> {
  if (workflow.diffFile) {
    return { base: workflow.base ?? PATCH_BASE_LABEL, head: workflow.head ?? PATCH_HEAD_LABEL };
  }
  const git = new GitDiffProvider();
  const head = workflow.head ?? (await git.currentBranch(workflow.repoDir, signal));
  const base = workflow.base ?? (await git.defaultBranch(workflow.repoDir, signal));
  if (base === head) {
    throw new InputError(`Base and head refs are both "${base}"; pass --base or --head to pick what to compare.`);
  }
  return { base, head };
}

function buildInvoker(workflow: PreparedCheckWorkflow, onStatus: StatusCallback | undefined): ModelInvoker {
  const provider = chooseProvider(workflow.config.provider);
  if (!provider) {
    const requested = workflow.config.provider === "auto" ? "codex or claude" : workflow.config.provider;
    throw new ConfigError(`No ${requested} CLI found in PATH. Install one or run with --dry-run.`);
  }
  return new CliModelInvoker({
    provider,
    model: workflow.config.model,
    cwd: workflow.repoDir,
    timeoutMs: workflow.config.aiTimeoutSec * 1000,
    onStatus
  });
}

function describeTransition(transition: JudgeTransition): string {
  const suffix = transition.reason ? ` (${transition.reason})` : "";
  return `Attempt ${transition.attempt}: ${transition.from} -> ${transition.to}${suffix}`;
}

function printJson(result: ScopeCheckResult): void {
  const retrieval = result.retrieval;
  const payload =
    result.kind === "dry-run"
      ? { dryRun: true, profile: result.profile, decoding: result.decoding, budget: result.budget, retrieval, prompt: result.prompt }
      : { verdict: result.verdict, report: result.report, retrieval, attempts: result.attempts };
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
}

function printText(result: ScopeCheckResult): void {
  if (result.retrieval.degradedSources.length) {
    log.warn(`Retrieval degraded (${result.retrieval.degradedSources.join(", ")}); the verdict has low confidence.`);
  }
  log.info(
    `Evidence: ${result.retrieval.used} chunk(s) in prompt, ${result.retrieval.dropped} dropped for budget (profile ${result.profile}).`
  );
  if (result.kind === "dry-run") {
    log.info(`Budget: ${result.budgetSummary}`);
    log.info(`Decoding: ${result.decoding}`);
    process.stdout.write(`${result.prompt}\n`);
    return;
  }
  if (result.repairs > 0) {
    log.warn(`Model output needed ${result.repairs} repair cycle(s) before it was accepted.`);
  }
  process.stdout.write(result.report);
}

export async function runCheck(
  pathArg: string | undefined,
  options: CheckCommandOptions,
  overrides: CheckCommandOverrides = {}
): Promise<ScopeCheckResult> {
  const workflow = prepareCheckWorkflow(pathArg, options);
  const json = workflow.format === "json";

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error("Interrupted"));
  const externalSignal = overrides.signal;
  const onExternalAbort = (): void => controller.abort(externalSignal?.reason);
  process.once("SIGINT", onInterrupt);
  if (externalSignal?.aborted) {
    onExternalAbort();
  } else {
    externalSignal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  const progress = json ? null : spinner({ indicator: "dots" });
  const onStatus: StatusCallback | undefined = progress ? (message) => progress.message(message) : undefined;
  progress?.start("Preparing scope check...");

  try {
    const refs = await resolveRefs(workflow, controller.signal);
    const diffProvider =
      overrides.diffProvider ?? (workflow.diffFile ? new PatchFileDiffProvider(workflow.diffFile) : new GitDiffProvider());
    const store =
      overrides.store ?? new LocalDocumentStore({ docsDir: workflow.docsDir, chunkTokenLimit: workflow.profile.chunkTokenLimit });
    const invoker = workflow.dryRun ? undefined : (overrides.invoker ?? buildInvoker(workflow, onStatus));

    const result = await runScopeCheck(
      { diffProvider, store, invoker, ...(overrides.loadWorkflows ? { loadWorkflows: overrides.loadWorkflows } : {}) },
      {
        repoDir: workflow.repoDir,
        base: refs.base,
        head: refs.head,
        projectId: workflow.projectId,
        description: workflow.description,
        config: workflow.config,
        profile: workflow.profile,
        dryRun: workflow.dryRun,
        signal: controller.signal,
        onStatus,
        onTransition: onStatus ? (transition) => onStatus(describeTransition(transition)) : undefined
      }
    );

    progress?.stop(result.kind === "dry-run" ? "Prompt assembled (dry run)." : "Scope check complete.");
    if (json) {
      printJson(result);
    } else {
      printText(result);
    }

    if (result.kind === "verdict" && workflow.failOnApproval && result.verdict.approvalRequired) {
      process.exitCode = EXIT_CODE_APPROVAL_REQUIRED;
    }
    return result;
  } catch (error) {
    progress?.stop("Scope check failed.", 1);
    throw error;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    externalSignal?.removeEventListener("abort", onExternalAbort);
  }
}
