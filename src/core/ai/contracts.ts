import type { DecodingMode } from "../types.js";

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
}

export type StatusCallback = (message: string) => void;

export type InvocationErrorKind = "timeout" | "quota_exceeded" | "invalid_credentials" | "unknown";

export interface InvocationRequest {
  prompt: string;
  schema: unknown;
  decoding: DecodingMode;
  signal?: AbortSignal | undefined;
}

export type InvocationResult =
  | { ok: true; text: string }
  | { ok: false; error: { kind: InvocationErrorKind; message: string } };

/** One opaque request/response exchange with a language model; transport retries live behind it. */
export interface ModelInvoker {
  readonly label: string;
  invoke(request: InvocationRequest): Promise<InvocationResult>;
}
