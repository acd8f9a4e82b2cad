import { existsSync, statSync } from "node:fs";

import { runCommand } from "../ai/process-runner.js";
import type { CommandResult } from "../ai/contracts.js";
import { CheckCancelledError, InputError, RefNotFoundError, RepoUnavailableError } from "../errors.js";
import type { ChangeSet } from "../types.js";
import { freezeChangeSet } from "./contracts.js";
import type { DiffProvider } from "./contracts.js";
import { parseUnifiedDiff } from "./unified-diff.js";

const DEFAULT_GIT_TIMEOUT_MS = 30_000;

export class GitDiffProvider implements DiffProvider {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  async getChangeSet(repoRef: string, base: string, head: string, signal?: AbortSignal): Promise<ChangeSet> {
    await this.assertRepository(repoRef, signal);
    await this.assertRef(repoRef, base, signal);
    await this.assertRef(repoRef, head, signal);

    // Three-dot: compare head against its merge base, like a pull request does.
    const diff = await this.git(
      repoRef,
      ["-c", "core.quotePath=false", "diff", "--no-color", "--no-ext-diff", "-M", `${base}...${head}`],
      signal
    );
    if (!diff.ok) {
      throw new RepoUnavailableError(repoRef, { details: { reason: diff.reason, stderr: diff.stderr.trim() } });
    }

    const log = await this.git(repoRef, ["log", "--format=%s", `${base}..${head}`], signal);
    const commitSubjects = log.ok
      ? log.stdout
          .split(/\r?\n/)
          .map((line) => line.trim())
          .filter((line) => line.length > 0)
      : [];

    return freezeChangeSet({
      repoRef,
      base,
      head,
      files: parseUnifiedDiff(diff.stdout),
      metadata: {
        title: commitSubjects[commitSubjects.length - 1] ?? "(no commits)",
        commitSubjects
      }
    });
  }

  async currentBranch(repoRef: string, signal?: AbortSignal): Promise<string> {
    await this.assertRepository(repoRef, signal);
    const result = await this.git(repoRef, ["rev-parse", "--abbrev-ref", "HEAD"], signal);
    const branch = result.stdout.trim();
    if (!result.ok || !branch || branch === "HEAD") {
      throw new InputError("Could not determine the current branch. Pass --head explicitly.");
    }
    return branch;
  }

  async defaultBranch(repoRef: string, signal?: AbortSignal): Promise<string> {
    const result = await this.git(repoRef, ["branch", "--list", "--format=%(refname:short)"], signal);
    const branches = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    for (const candidate of ["main", "master"]) {
      if (branches.includes(candidate)) return candidate;
    }
    const first = branches[0];
    if (!first) {
      throw new InputError("Could not determine a base branch. Pass --base explicitly.");
    }
    return first;
  }

  private async assertRepository(repoRef: string, signal: AbortSignal | undefined): Promise<void> {
    if (!existsSync(repoRef) || !statSync(repoRef).isDirectory()) {
      throw new RepoUnavailableError(repoRef);
    }
    const probe = await this.git(repoRef, ["rev-parse", "--is-inside-work-tree"], signal);
    if (!probe.ok || probe.stdout.trim() !== "true") {
      throw new RepoUnavailableError(repoRef, { details: { reason: probe.reason } });
    }
  }

  private async assertRef(repoRef: string, ref: string, signal: AbortSignal | undefined): Promise<void> {
    const result = await this.git(repoRef, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], signal);
    if (!result.ok) {
      throw new RefNotFoundError(ref);
    }
  }

  private async git(repoRef: string, args: string[], signal: AbortSignal | undefined): Promise<CommandResult> {
    const result = await runCommand("git", ["-C", repoRef, ...args], { timeoutMs: this.timeoutMs, signal });
    if (signal?.aborted) {
      throw new CheckCancelledError(undefined, { cause: signal.reason });
    }
    return result;
  }
}
