import { describe, expect, it } from "vitest";

import { runCommand } from "../src/core/ai/process-runner.js";

describe("runCommand", () => {
  it("collects stdout and stderr of a successful command", async () => {
    const result = await runCommand(process.execPath, ["-e", "console.log('verdict'); console.error('note');"], {
      timeoutMs: 5000
    });

    expect(result).toEqual({ ok: true, stdout: "verdict\n", stderr: "note\n" });
  });

  it("reports the exit code of a failing command", async () => {
    const result = await runCommand(process.execPath, ["-e", "process.exit(3);"], { timeoutMs: 5000 });

    expect(result.ok).toBe(false);
    expect(result.reason).toBe("exit code 3");
  });

  it("times out hung commands", async () => {
    const result = await runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], { timeoutMs: 250 });

    expect(result.ok).toBe(false);
    expect(result.reason).toBe("timeout after 0.25s");
  });

  it("does not start a command for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runCommand(process.execPath, ["-e", "console.log('never');"], { signal: controller.signal });
    expect(result).toEqual({ ok: false, stdout: "", stderr: "", reason: "aborted" });
  });

  it("kills the command when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], {
      timeoutMs: 5000,
      signal: controller.signal
    });
    setTimeout(() => controller.abort(), 100);

    const result = await pending;
    expect(result.ok).toBe(false);
    expect(result.reason).toBe("aborted");
  });

  it("keeps only output tail instead of killing noisy processes", async () => {
    const result = await runCommand(
      process.execPath,
      ["-e", "const chunk='x'.repeat(2048); for (let i = 0; i < 128; i += 1) process.stdout.write(chunk);"],
      {
        timeoutMs: 5000,
        maxBufferBytes: 4096
      }
    );

    expect(result.ok).toBe(true);
    expect(Buffer.byteLength(result.stdout, "utf8")).toBeLessThanOrEqual(4096);
  });

  it("adds truncation notice for failing commands with oversized output", async () => {
    const result = await runCommand(
      process.execPath,
      [
        "-e",
        "const chunk='y'.repeat(2048); for (let i = 0; i < 128; i += 1) process.stderr.write(chunk); process.exit(7);"
      ],
      {
        timeoutMs: 5000,
        maxBufferBytes: 4096
      }
    );

    expect(result.ok).toBe(false);
    expect(result.reason).toBe("exit code 7; output truncated to last 4096 bytes per stream");
  });
});
