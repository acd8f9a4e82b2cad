import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { DecodingMode } from "../types.js";
import { runCommand } from "./process-runner.js";
import type { CommandResult, InvocationErrorKind, StatusCallback } from "./contracts.js";
import type { ResolvedAiProvider } from "./provider-selection.js";

const DEFAULT_CODEX_REASONING_EFFORT = "high";
const DEFAULT_CODEX_SANDBOX_MODE = "read-only";
const DEFAULT_STRUCTURED_TIMEOUT_MS = 10 * 60 * 1000;

export interface StructuredTaskOptions {
  cwd?: string | undefined;
  onStatus?: StatusCallback | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
  decoding?: DecodingMode | undefined;
}

export function summarizeFailure(result: CommandResult): string {
  const reason = result.reason ?? "unknown error";
  const combined = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  if (!combined) return reason;
  const snippet = combined.length > 280 ? `${combined.slice(0, 280)}...` : combined;
  return `${reason}: ${snippet}`;
}

const QUOTA_MARKERS = [
  /quota/i,
  /rate[ _-]?limit/i,
  /usage limit/i,
  /insufficient_quota/i,
  /\b429\b/,
  /credit balance is too low/i
];

const CREDENTIAL_MARKERS = [
  /invalid api key/i,
  /invalid[ _-]?x-api-key/i,
  /unauthori[sz]ed/i,
  /authentication[ _]error/i,
  /\b401\b/,
  /not logged in/i,
  /please run .*login/i
];

export function classifyFailure(result: CommandResult): InvocationErrorKind {
  if (result.reason?.toLowerCase().includes("timeout")) return "timeout";
  const output = `${result.reason ?? ""}\n${result.stderr}\n${result.stdout}`;
  if (QUOTA_MARKERS.some((marker) => marker.test(output))) return "quota_exceeded";
  if (CREDENTIAL_MARKERS.some((marker) => marker.test(output))) return "invalid_credentials";
  return "unknown";
}

// Modes are retried only on unclassified failures; timeouts, quota and credential errors return at once.
function shouldTryNextMode(result: CommandResult, signal: AbortSignal | undefined): boolean {
  return !result.ok && !signal?.aborted && classifyFailure(result) === "unknown";
}

function codexBaseArgs(model: string | undefined): string[] {
  const args = [
    "exec",
    "--sandbox",
    DEFAULT_CODEX_SANDBOX_MODE,
    "--skip-git-repo-check",
    "-c",
    `model_reasoning_effort="${DEFAULT_CODEX_REASONING_EFFORT}"`
  ];
  if (model) {
    args.push("--model", model);
  }
  return args;
}

async function runCodexStructured(
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_STRUCTURED_TIMEOUT_MS;
  const runOptions = { cwd: options.cwd, timeoutMs, signal: options.signal };

  if (options.decoding === "freeform") {
    return runCommand("codex", [...codexBaseArgs(options.model), prompt], runOptions);
  }

  const tempDir = mkdtempSync(join(tmpdir(), "scope-sentinel-codex-"));
  const schemaPath = join(tempDir, "output-schema.json");
  writeFileSync(schemaPath, JSON.stringify(outputSchema, null, 2), "utf8");

  try {
    options.onStatus?.("Trying codex structured JSON mode...");
    const primary = await runCommand(
      "codex",
      [...codexBaseArgs(options.model), "--output-schema", schemaPath, prompt],
      runOptions
    );
    if (!shouldTryNextMode(primary, options.signal)) return primary;
    options.onStatus?.("Structured mode unavailable, retrying codex standard mode...");

    return runCommand("codex", [...codexBaseArgs(options.model), prompt], runOptions);
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
}

async function runClaudeStructured(
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_STRUCTURED_TIMEOUT_MS;
  const runOptions = { cwd: options.cwd, timeoutMs, signal: options.signal };
  const withModel = (args: string[]): string[] => (options.model ? [...args, "--model", options.model] : args);

  if (options.decoding !== "freeform") {
    options.onStatus?.("Trying claude JSON schema mode...");
    const primary = await runCommand(
      "claude",
      withModel([
        "-p",
        prompt,
        "--output-format",
        "json",
        "--json-schema",
        JSON.stringify(outputSchema),
        "--tools",
        "",
        "--no-session-persistence"
      ]),
      runOptions
    );
    if (!shouldTryNextMode(primary, options.signal)) return primary;
    options.onStatus?.("Schema mode failed, retrying claude JSON output mode...");
  }

  const secondary = await runCommand(
    "claude",
    withModel(["-p", prompt, "--output-format", "json", "--tools", "", "--no-session-persistence"]),
    runOptions
  );
  if (!shouldTryNextMode(secondary, options.signal)) return secondary;

  options.onStatus?.("JSON output mode failed, retrying plain claude mode...");
  return runCommand("claude", withModel(["-p", prompt, "--tools", "", "--no-session-persistence"]), runOptions);
}

export async function runStructuredTask(
  provider: ResolvedAiProvider,
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<CommandResult> {
  return provider === "codex"
    ? runCodexStructured(prompt, outputSchema, options)
    : runClaudeStructured(prompt, outputSchema, options);
}
