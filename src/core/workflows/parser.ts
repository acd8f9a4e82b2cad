import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { parse as parseYaml } from "yaml";

import { InputError } from "../errors.js";
import type { WorkflowJob, WorkflowSpec } from "../types.js";

const WORKFLOWS_DIR = join(".github", "workflows");
const PATH_FILTER_EVENTS = ["push", "pull_request", "pull_request_target"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.map((entry) => String(entry));
  if (typeof value === "string") return [value];
  return [];
}

function extractTriggers(on: unknown): string[] {
  if (typeof on === "string") return [on];
  if (Array.isArray(on)) return on.map((entry) => String(entry));
  if (isRecord(on)) return Object.keys(on);
  return [];
}

function extractPathFilters(on: unknown, key: "paths" | "paths-ignore"): string[] {
  if (!isRecord(on)) return [];
  const globs: string[] = [];
  for (const event of PATH_FILTER_EVENTS) {
    const config = on[event];
    if (!isRecord(config)) continue;
    for (const glob of toStringList(config[key])) {
      if (!globs.includes(glob)) globs.push(glob);
    }
  }
  return globs;
}

function describeStep(step: unknown, index: number): string {
  if (typeof step === "string") return step;
  if (!isRecord(step)) return `step ${index + 1}`;
  const label = step.name ?? step.uses ?? step.run;
  if (typeof label !== "string") return `step ${index + 1}`;
  const firstLine = label.split(/\r?\n/)[0]?.trim() ?? "";
  return firstLine || `step ${index + 1}`;
}

function extractJobs(jobs: unknown): WorkflowJob[] {
  if (!isRecord(jobs)) return [];
  return Object.entries(jobs).map(([id, job]) => {
    if (!isRecord(job)) return { name: id, steps: [] };
    const steps = Array.isArray(job.steps) ? job.steps.map((step, index) => describeStep(step, index)) : [];
    return {
      name: typeof job.name === "string" ? job.name : id,
      steps
    };
  });
}

export function parseWorkflowText(text: string, file: string): WorkflowSpec {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new InputError(`Workflow file ${file} is not valid YAML.`, { cause: error, details: { file } });
  }
  if (!isRecord(parsed)) {
    throw new InputError(`Workflow file ${file} does not contain a mapping.`, { details: { file } });
  }

  // YAML 1.1 readers turn a bare `on:` key into boolean true.
  const on = parsed.on ?? parsed.true;
  const fallbackName = file.replace(/^.*[\\/]/, "").replace(/\.ya?ml$/i, "");

  return {
    name: typeof parsed.name === "string" ? parsed.name : fallbackName,
    file,
    triggers: extractTriggers(on),
    jobs: extractJobs(parsed.jobs),
    pathGlobs: extractPathFilters(on, "paths"),
    pathIgnoreGlobs: extractPathFilters(on, "paths-ignore")
  };
}

/** Reads `.github/workflows/*.{yml,yaml}`; a repository without workflows yields an empty list. */
export function parseWorkflows(repoDir: string): WorkflowSpec[] {
  const directory = join(repoDir, WORKFLOWS_DIR);
  if (!existsSync(directory)) return [];

  const files = readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && /\.ya?ml$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  return files.map((name) => {
    const relativePath = `.github/workflows/${name}`;
    return parseWorkflowText(readFileSync(join(directory, name), "utf8"), relativePath);
  });
}
