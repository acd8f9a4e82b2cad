import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runCommand: vi.fn()
}));

vi.mock("../src/core/ai/process-runner.js", () => ({
  runCommand: mocks.runCommand
}));

const SCHEMA = { type: "object", properties: {} };
const CODEX_BASE = ["exec", "--sandbox", "read-only", "--skip-git-repo-check", "-c", 'model_reasoning_effort="high"'];

describe("ai provider command wiring", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
    mocks.runCommand.mockResolvedValue({
      ok: true,
      stdout: "{}",
      stderr: ""
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("passes the output schema file to codex in schema mode", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("codex", "review", SCHEMA, { cwd: "/repo", model: "gpt-5-codex", decoding: "schema" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    expect(mocks.runCommand).toHaveBeenCalledWith(
      "codex",
      [...CODEX_BASE, "--model", "gpt-5-codex", "--output-schema", expect.stringMatching(/output-schema\.json$/), "review"],
      { cwd: "/repo", timeoutMs: 600_000 }
    );
  });

  it("sends a plain codex prompt in freeform mode with the given timeout", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("codex", "review", SCHEMA, { decoding: "freeform", timeoutMs: 90_000 });

    expect(mocks.runCommand).toHaveBeenCalledWith("codex", [...CODEX_BASE, "review"], { timeoutMs: 90_000 });
  });

  it("retries codex without the schema when structured mode fails", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");
    const onStatus = vi.fn();
    mocks.runCommand
      .mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown flag", reason: "exit code 2" })
      .mockResolvedValueOnce({ ok: true, stdout: "{}", stderr: "" });

    const result = await runStructuredTask("codex", "review", SCHEMA, { onStatus });

    expect(result.ok).toBe(true);
    expect(onStatus).toHaveBeenCalledWith("Structured mode unavailable, retrying codex standard mode...");
    expect(mocks.runCommand).toHaveBeenNthCalledWith(2, "codex", [...CODEX_BASE, "review"], { timeoutMs: 600_000 });
  });

  it("uses claude JSON schema mode for schema decoding", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("claude", "review", SCHEMA, { model: "sonnet", decoding: "schema" });

    expect(mocks.runCommand).toHaveBeenCalledWith(
      "claude",
      [
        "-p",
        "review",
        "--output-format",
        "json",
        "--json-schema",
        JSON.stringify(SCHEMA),
        "--tools",
        "",
        "--no-session-persistence",
        "--model",
        "sonnet"
      ],
      { timeoutMs: 600_000 }
    );
  });

  it("skips claude schema mode for freeform decoding", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("claude", "review", SCHEMA, { decoding: "freeform" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    expect(mocks.runCommand).toHaveBeenCalledWith(
      "claude",
      ["-p", "review", "--output-format", "json", "--tools", "", "--no-session-persistence"],
      { timeoutMs: 600_000 }
    );
  });

  it("returns a claude timeout without trying the other modes", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");
    const onStatus = vi.fn();
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", reason: "timeout after 600s" });

    const result = await runStructuredTask("claude", "review", SCHEMA, { decoding: "schema", onStatus });

    expect(result.reason).toBe("timeout after 600s");
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    expect(onStatus).not.toHaveBeenCalledWith("Schema mode failed, retrying claude JSON output mode...");
  });

  it("keeps codex schema decoding when the failure is a credential error", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "Error: 401 Unauthorized", reason: "exit code 1" });

    const result = await runStructuredTask("codex", "review", SCHEMA, { decoding: "schema" });

    expect(result.ok).toBe(false);
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
  });

  it("falls through every claude mode on unclassified failures", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");
    mocks.runCommand
      .mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown option --json-schema", reason: "exit code 2" })
      .mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown option --output-format", reason: "exit code 2" })
      .mockResolvedValueOnce({ ok: true, stdout: "{}", stderr: "" });

    const result = await runStructuredTask("claude", "review", SCHEMA, { decoding: "schema" });

    expect(result.ok).toBe(true);
    expect(mocks.runCommand).toHaveBeenCalledTimes(3);
    expect(mocks.runCommand).toHaveBeenLastCalledWith("claude", ["-p", "review", "--tools", "", "--no-session-persistence"], {
      timeoutMs: 600_000
    });
  });

  it("does not fall back once the signal is aborted", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");
    const controller = new AbortController();
    controller.abort();
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", reason: "aborted" });

    const result = await runStructuredTask("claude", "review", SCHEMA, { signal: controller.signal });

    expect(result.reason).toBe("aborted");
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
  });
});

describe("CliModelInvoker", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
  });

  it("returns the CLI output as the model text", async () => {
    const { CliModelInvoker } = await import("../src/core/ai/cli-invoker.js");
    mocks.runCommand.mockResolvedValue({ ok: true, stdout: '{"alignment_score":1}\n', stderr: "" });

    const invoker = new CliModelInvoker({ provider: "claude", model: "sonnet" });
    const result = await invoker.invoke({ prompt: "review", schema: SCHEMA, decoding: "schema" });

    expect(invoker.label).toBe("claude (sonnet)");
    expect(result).toEqual({ ok: true, text: '{"alignment_score":1}' });
  });

  it("classifies quota failures", async () => {
    const { CliModelInvoker } = await import("../src/core/ai/cli-invoker.js");
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "Error: 429 rate limit", reason: "exit code 1" });

    const result = await new CliModelInvoker({ provider: "claude" }).invoke({
      prompt: "review",
      schema: SCHEMA,
      decoding: "freeform"
    });

    expect(result).toEqual({
      ok: false,
      error: { kind: "quota_exceeded", message: "claude invocation failed (exit code 1: Error: 429 rate limit)" }
    });
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
  });
});

describe("classifyFailure", () => {
  it("maps CLI failures to invocation error kinds", async () => {
    const { classifyFailure } = await import("../src/core/ai/providers.js");

    expect(classifyFailure({ ok: false, stdout: "", stderr: "", reason: "timeout after 600s" })).toBe("timeout");
    expect(classifyFailure({ ok: false, stdout: "", stderr: "Invalid API key", reason: "exit code 1" })).toBe(
      "invalid_credentials"
    );
    expect(classifyFailure({ ok: false, stdout: "You exceeded your current quota", stderr: "", reason: "exit code 1" })).toBe(
      "quota_exceeded"
    );
    expect(classifyFailure({ ok: false, stdout: "", stderr: "segfault", reason: "exit code 139" })).toBe("unknown");
  });
});

describe("chooseProvider", () => {
  it("prefers claude, then codex, when auto-detecting", async () => {
    const { chooseProvider } = await import("../src/core/ai/provider-selection.js");

    expect(chooseProvider("auto", () => true)).toBe("claude");
    expect(chooseProvider("auto", (command) => command === "codex")).toBe("codex");
    expect(chooseProvider("auto", () => false)).toBeNull();
    expect(chooseProvider("codex", () => false)).toBeNull();
  });
});
