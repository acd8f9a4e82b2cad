import { minimatch } from "minimatch";

import type { WorkflowSpec } from "../types.js";

const MATCH_OPTIONS = { dot: true } as const;

/** GitHub evaluates `paths` in order; a later `!pattern` excludes what earlier patterns matched. */
function matchesFilterList(path: string, globs: string[]): boolean {
  let matched = false;
  for (const glob of globs) {
    if (glob.startsWith("!")) {
      if (matched && minimatch(path, glob.slice(1), MATCH_OPTIONS)) matched = false;
      continue;
    }
    if (!matched && minimatch(path, glob, MATCH_OPTIONS)) matched = true;
  }
  return matched;
}

/** True when an explicit `paths` glob of the workflow selects this file. */
export function workflowReferencesPath(workflow: WorkflowSpec, path: string): boolean {
  if (!workflow.pathGlobs.length) return false;
  return matchesFilterList(path, workflow.pathGlobs);
}

/** True when the workflow would run for a change touching these files. */
export function workflowRunsFor(workflow: WorkflowSpec, paths: string[]): boolean {
  if (workflow.pathGlobs.length > 0) {
    return paths.some((path) => matchesFilterList(path, workflow.pathGlobs));
  }
  if (workflow.pathIgnoreGlobs.length > 0) {
    return paths.some((path) => !workflow.pathIgnoreGlobs.some((glob) => minimatch(path, glob, MATCH_OPTIONS)));
  }
  return workflow.triggers.length > 0;
}
