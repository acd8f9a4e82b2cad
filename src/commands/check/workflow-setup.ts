import { existsSync, statSync } from "node:fs";
import { basename, resolve } from "node:path";

import { resolveConfig, resolveModelProfile } from "../../core/config.js";
import type { ConfigFile, ModelProfile, SentinelConfig } from "../../core/config.js";
import { InputError, normalizeOutputFormat } from "../../core/errors.js";
import type { CliOutputFormat } from "../../core/errors.js";
import type { AiProvider, CheckCommandOptions, ModelProfileName } from "../../core/types.js";

const MAX_RETRIES_LIMIT = 10;
const MIN_AI_TIMEOUT_SEC = 10;
const MAX_AI_TIMEOUT_SEC = 4 * 60 * 60;

export interface PreparedCheckWorkflow {
  repoDir: string;
  projectId: string;
  docsDir: string;
  diffFile?: string;
  base?: string;
  head?: string;
  description?: string;
  format: CliOutputFormat;
  dryRun: boolean;
  failOnApproval: boolean;
  config: SentinelConfig;
  profile: ModelProfile;
}

function parseNumber(value: number | string, integer: boolean): number {
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  if (!trimmed) return Number.NaN;
  const parsed = Number(trimmed);
  return integer && !Number.isInteger(parsed) ? Number.NaN : parsed;
}

function normalizeInteger(flag: string, value: number | string | undefined, min: number, max: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseNumber(value, true);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new InputError(`Invalid ${flag} value "${String(value)}". Expected an integer between ${min} and ${max}.`);
  }
  return parsed;
}

function normalizeThreshold(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseNumber(value, false);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InputError(`Invalid --approval-threshold value "${String(value)}". Expected a number between 0 and 1.`);
  }
  return parsed;
}

function normalizeProvider(value: string | undefined): AiProvider | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "auto" || normalized === "codex" || normalized === "claude") return normalized;
  throw new InputError(`Invalid --provider value "${value}". Expected auto, codex or claude.`);
}

function normalizeProfile(value: string | undefined): ModelProfileName | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "auto" || normalized === "default" || normalized === "small") return normalized;
  throw new InputError(`Invalid --profile value "${value}". Expected auto, default or small.`);
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function flagLayer(options: CheckCommandOptions): ConfigFile {
  const layer: ConfigFile = {};
  const provider = normalizeProvider(options.provider);
  const profile = normalizeProfile(options.profile);
  const model = optionalText(options.model);
  const projectId = optionalText(options.project);
  const docsDir = optionalText(options.docs);
  const maxRetries = normalizeInteger("--max-retries", options.maxRetries, 0, MAX_RETRIES_LIMIT);
  const approvalThreshold = normalizeThreshold(options.approvalThreshold);
  const aiTimeoutSec = normalizeInteger("--ai-timeout-sec", options.aiTimeoutSec, MIN_AI_TIMEOUT_SEC, MAX_AI_TIMEOUT_SEC);

  if (provider !== undefined) layer.provider = provider;
  if (profile !== undefined) layer.profile = profile;
  if (model !== undefined) layer.model = model;
  if (projectId !== undefined) layer.projectId = projectId;
  if (docsDir !== undefined) layer.docsDir = docsDir;
  if (maxRetries !== undefined) layer.maxRetries = maxRetries;
  if (approvalThreshold !== undefined) layer.approvalThreshold = approvalThreshold;
  if (aiTimeoutSec !== undefined) layer.aiTimeoutSec = aiTimeoutSec;
  return layer;
}

export function prepareCheckWorkflow(
  pathArg: string | undefined,
  options: CheckCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): PreparedCheckWorkflow {
  const repoDir = resolve(process.cwd(), pathArg ?? ".");
  if (!existsSync(repoDir) || !statSync(repoDir).isDirectory()) {
    throw new InputError(`Target path is not a directory: ${repoDir}`);
  }

  const format = normalizeOutputFormat(options.format);
  const config = resolveConfig({ repoDir, flags: flagLayer(options), env });
  const base = optionalText(options.base);
  const head = optionalText(options.head);
  if (base && head && base === head) {
    throw new InputError(`Base and head refs are both "${base}"; there is nothing to compare.`);
  }

  const diffFile = optionalText(options.diffFile);
  const description = optionalText(options.description);

  return {
    repoDir,
    projectId: config.projectId ?? basename(repoDir),
    docsDir: resolve(repoDir, config.docsDir),
    ...(diffFile ? { diffFile: resolve(process.cwd(), diffFile) } : {}),
    ...(base ? { base } : {}),
    ...(head ? { head } : {}),
    ...(description ? { description } : {}),
    format,
    dryRun: options.dryRun ?? false,
    failOnApproval: options.failOnApproval ?? false,
    config,
    profile: resolveModelProfile(config)
  };
}
