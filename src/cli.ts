#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { resolve } from "node:path";

import { log } from "@clack/prompts";
import { Command } from "commander";
import { z } from "zod";

import { runCheck } from "./commands/check.js";
import { runInstallHook } from "./commands/install-hook.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { CheckCommandOptions, InstallHookCommandOptions } from "./core/types.js";

const packageSchema = z.object({ version: z.string() });

function readCliVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  return packageSchema.parse(JSON.parse(raw)).version;
}

const INFORMATIONAL_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

const program = new Command();
const CLI_VERSION = readCliVersion();

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  teal: "\u001B[38;5;37m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  const head = Math.max(1, Math.floor((maxWidth - 1) * 0.7));
  const tail = Math.max(0, maxWidth - 1 - head);
  return `${text.slice(0, head)}…${text.slice(text.length - tail)}`;
}

function renderBrandHeader(pathArg: string | undefined): void {
  const target = compactPath(resolve(process.cwd(), pathArg ?? "."));
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(78, Math.max(36, terminalWidth - 4));

  const rows = [
    paint(ellipsize("scope-sentinel", innerWidth), ANSI.bold, ANSI.teal),
    paint(ellipsize("Design-scope checks for code changes", innerWidth), ANSI.white),
    "",
    `${paint("version:".padEnd(11, " "), ANSI.mutedGray)}${paint(ellipsize(`v${CLI_VERSION}`, innerWidth - 11), ANSI.white)}`,
    `${paint("target:".padEnd(11, " "), ANSI.mutedGray)}${paint(ellipsize(target, innerWidth - 11), ANSI.white)}`
  ];
  const plainWidths = [
    Math.min("scope-sentinel".length, innerWidth),
    Math.min("Design-scope checks for code changes".length, innerWidth),
    0,
    11 + Math.min(`v${CLI_VERSION}`.length, innerWidth - 11),
    11 + Math.min(target.length, innerWidth - 11)
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  rows.forEach((row, index) => {
    const padding = " ".repeat(Math.max(0, innerWidth - (plainWidths[index] ?? 0)));
    console.log(`${vertical} ${row}${padding} ${vertical}`);
  });
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

program
  .name("scope-sentinel")
  .description("Judge whether a code change stays within its project's approved design documents.")
  .version(CLI_VERSION)
  .exitOverride();

program
  .command("check")
  .description("Compare a branch diff (or a saved patch) against the approved design docs and report scope violations.")
  .argument("[path]", "Repository directory (defaults to current working directory)")
  .option("--base <ref>", "Base ref (defaults to main or master)")
  .option("--head <ref>", "Head ref (defaults to the current branch)")
  .option("--diff-file <path>", "Read the change from a unified diff file instead of git")
  .option("--project <id>", "Project id used to scope design documents (defaults to the directory name)")
  .option("--description <text>", "What the change is meant to do; steers evidence retrieval")
  .option("--docs <dir>", "Design documents directory, relative to the repository (default: docs/design)")
  .option("--provider <provider>", "auto | codex | claude")
  .option("--model <model>", "Model id to pass to the provider CLI")
  .option("--profile <profile>", "auto | default | small")
  .option("--max-retries <count>", "Repair attempts for malformed model output (0-10, default: 2)")
  .option("--approval-threshold <score>", "Scores below this require approval (0-1, default: 0.6)")
  .option("--ai-timeout-sec <seconds>", "Timeout per model invocation in seconds (default: 600)")
  .option("--format <format>", "text | json", "text")
  .option("--dry-run", "Assemble and print the prompt without invoking a model", false)
  .option("--fail-on-approval", "Exit with code 3 when approval is required", false)
  .action(async (pathArg: string | undefined, rawOptions: CheckCommandOptions) => {
    if (resolveOutputFormatFromArgv(process.argv) === "text") {
      renderBrandHeader(pathArg);
    }
    await runCheck(pathArg, rawOptions);
  });

program
  .command("install-hook")
  .description("Install a git hook that runs the scope check on every push or commit.")
  .argument("[path]", "Repository directory (defaults to current working directory)")
  .option("--hook <hook>", "pre-push | post-commit", "pre-push")
  .option("-y, --yes", "Overwrite an existing hook without asking")
  .action(async (pathArg: string | undefined, rawOptions: InstallHookCommandOptions) => {
    await runInstallHook(pathArg, rawOptions);
  });

async function main(): Promise<void> {
  const format = resolveOutputFormatFromArgv(process.argv);
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    const commanderCode = normalized.details?.commanderCode;
    if (typeof commanderCode === "string" && INFORMATIONAL_EXITS.has(commanderCode)) {
      return;
    }
    if (format === "json") {
      process.stdout.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
