export type CliOutputFormat = "text" | "json";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface SentinelErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class SentinelError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: SentinelErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** Bad refs, missing repositories, unparseable workflow files or invalid flags. Never retried. */
export class InputError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super(message, "INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class RefNotFoundError extends InputError {
  readonly ref: string;

  constructor(ref: string, options: SentinelErrorOptions = {}) {
    super(`Git ref not found: ${ref}`, { ...options, details: { ref, ...options.details } });
    this.ref = ref;
  }
}

export class RepoUnavailableError extends InputError {
  constructor(repoRef: string, options: SentinelErrorOptions = {}) {
    super(`Repository is not available: ${repoRef}`, { ...options, details: { repoRef, ...options.details } });
  }
}

export class ConfigError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class BudgetExceededError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super(message, "BUDGET_EXCEEDED", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class AnalysisUnavailableError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super(message, "ANALYSIS_UNAVAILABLE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class CheckCancelledError extends SentinelError {
  constructor(message = "Scope check was cancelled.", options: SentinelErrorOptions = {}) {
    super(message, "CANCELLED", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class ExecutionError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): SentinelError {
  if (error instanceof SentinelError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new InputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CheckCancelledError(undefined, { cause: signal.reason });
  }
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new InputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): CliOutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      if (!next) return "text";
      return next.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    const value = token.slice("--format=".length).trim().toLowerCase();
    return value === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: SentinelError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
