import { existsSync, statSync } from "node:fs";
import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";

import { cancel, confirm, isCancel, log } from "@clack/prompts";

import { InputError, RepoUnavailableError } from "../core/errors.js";
import type { InstallHookCommandOptions } from "../core/types.js";

export const GIT_HOOKS = ["pre-push", "post-commit"] as const;
export type GitHook = (typeof GIT_HOOKS)[number];

const HOOK_MODE = 0o755;

export interface InstallHookResult {
  hookPath: string;
  installed: boolean;
}

function isGitHook(value: string): value is GitHook {
  return GIT_HOOKS.some((hook) => hook === value);
}

function normalizeHook(value: string | undefined): GitHook {
  const normalized = value?.trim().toLowerCase() ?? "pre-push";
  if (isGitHook(normalized)) return normalized;
  throw new InputError(`Invalid --hook value "${String(value)}". Expected ${GIT_HOOKS.join(" or ")}.`);
}

function isInteractiveSession(): boolean {
  return Boolean(process.stdout.isTTY) && Boolean(process.stdin.isTTY);
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// Worktrees and submodules keep a `.git` file that points at the real git directory.
async function resolveGitDir(repoDir: string): Promise<string> {
  const dotGit = join(repoDir, ".git");
  if (!existsSync(dotGit)) throw new RepoUnavailableError(repoDir);
  if (statSync(dotGit).isDirectory()) return dotGit;

  const pointer = /^gitdir:\s*(.+)$/m.exec(await readFile(dotGit, "utf8"));
  const target = pointer?.[1]?.trim();
  if (!target) throw new RepoUnavailableError(repoDir, { details: { reason: "unreadable .git file" } });
  return isAbsolute(target) ? target : resolve(repoDir, target);
}

/** A pre-push hook blocks the push when approval is required; a post-commit hook only reports. */
export function renderHookScript(hook: GitHook, repoDir: string): string {
  const check =
    hook === "pre-push"
      ? `scope-sentinel check ${shellQuote(repoDir)} --fail-on-approval`
      : `scope-sentinel check ${shellQuote(repoDir)} || true`;
  return [
    "#!/bin/sh",
    `# scope-sentinel ${hook} hook, installed by \`scope-sentinel install-hook\``,
    'echo "scope-sentinel: checking change scope..."',
    check,
    ""
  ].join("\n");
}

export async function runInstallHook(
  pathArg: string | undefined,
  options: InstallHookCommandOptions
): Promise<InstallHookResult> {
  const hook = normalizeHook(options.hook);
  const repoDir = resolve(process.cwd(), pathArg ?? ".");
  const hooksDir = join(await resolveGitDir(repoDir), "hooks");
  const hookPath = join(hooksDir, hook);

  if (existsSync(hookPath) && !options.yes) {
    if (!isInteractiveSession()) {
      throw new InputError(`Hook ${hookPath} already exists. Pass --yes to overwrite it.`);
    }
    const overwrite = await confirm({ message: `Hook ${hookPath} already exists. Overwrite?`, initialValue: false });
    if (isCancel(overwrite)) {
      cancel("Hook installation canceled.");
      return { hookPath, installed: false };
    }
    if (!overwrite) {
      log.info(`Kept the existing ${hook} hook.`);
      return { hookPath, installed: false };
    }
  }

  await mkdir(hooksDir, { recursive: true });
  await writeFile(hookPath, renderHookScript(hook, repoDir), { encoding: "utf8", mode: HOOK_MODE });
  await chmod(hookPath, HOOK_MODE);
  log.success(`Installed ${hook} hook at ${hookPath}`);
  return { hookPath, installed: true };
}
