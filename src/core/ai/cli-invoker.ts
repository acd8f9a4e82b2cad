import type { InvocationRequest, InvocationResult, ModelInvoker, StatusCallback } from "./contracts.js";
import type { ResolvedAiProvider } from "./provider-selection.js";
import { classifyFailure, runStructuredTask, summarizeFailure } from "./providers.js";
import { combineOutput, runWithLiveStatus } from "./task-shared.js";

export interface CliModelInvokerOptions {
  provider: ResolvedAiProvider;
  model?: string | undefined;
  cwd?: string | undefined;
  timeoutMs?: number | undefined;
  onStatus?: StatusCallback | undefined;
}

/** Drives the installed `codex` or `claude` CLI as the model invocation service. */
export class CliModelInvoker implements ModelInvoker {
  readonly label: string;
  private readonly options: CliModelInvokerOptions;

  constructor(options: CliModelInvokerOptions) {
    this.options = options;
    this.label = options.model ? `${options.provider} (${options.model})` : options.provider;
  }

  async invoke(request: InvocationRequest): Promise<InvocationResult> {
    const { provider, onStatus } = this.options;
    const result = await runWithLiveStatus(provider, onStatus, () =>
      runStructuredTask(provider, request.prompt, request.schema, {
        cwd: this.options.cwd,
        model: this.options.model,
        timeoutMs: this.options.timeoutMs,
        onStatus,
        signal: request.signal,
        decoding: request.decoding
      })
    );

    if (result.ok) {
      return { ok: true, text: combineOutput(result) };
    }
    return {
      ok: false,
      error: {
        kind: classifyFailure(result),
        message: `${provider} invocation failed (${summarizeFailure(result)})`
      }
    };
  }
}
