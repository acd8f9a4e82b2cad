import { minimatch } from "minimatch";

import type { ChangeKind, ChangeSet, Hunk, WorkflowSpec } from "../types.js";
import { workflowReferencesPath, workflowRunsFor } from "../workflows/matching.js";

const TEST_FILE_GLOBS = [
  "**/*.test.*",
  "**/*.spec.*",
  "**/test/**",
  "**/tests/**",
  "**/__tests__/**",
  "**/test_*.py",
  "**/*_test.py",
  "**/*_test.go"
];

const DEPENDENCY_MANIFESTS = new Set([
  "package.json",
  "package-lock.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "requirements.txt",
  "pyproject.toml",
  "Pipfile",
  "poetry.lock",
  "go.mod",
  "go.sum",
  "Cargo.toml",
  "Cargo.lock",
  "Gemfile",
  "pom.xml",
  "build.gradle",
  "build.gradle.kts"
]);

export interface SummarizerOptions {
  maxExcerpts: number;
  maxHunkChars: number;
}

export interface SummarizedFile {
  path: string;
  changeKind: ChangeKind;
  previousPath?: string;
  additions: number;
  deletions: number;
  ciReferenced: boolean;
}

export interface HunkExcerpt {
  path: string;
  startLine: number;
  endLine: number;
  text: string;
  truncated: boolean;
}

export interface DiffSummaryFlags {
  hasCiTrigger: boolean;
  hasTestFileChange: boolean;
  hasWorkflowFileChange: boolean;
  hasDependencyManifestChange: boolean;
}

export interface DiffSummary {
  base: string;
  head: string;
  title: string;
  files: SummarizedFile[];
  excerpts: HunkExcerpt[];
  flags: DiffSummaryFlags;
  elidedHunks: number;
}

function hunkLines(hunk: Hunk): string[] {
  return hunk.text ? hunk.text.split("\n") : [];
}

function countChangedLines(hunks: Hunk[], marker: "+" | "-"): number {
  let count = 0;
  for (const hunk of hunks) {
    for (const line of hunkLines(hunk)) {
      if (line.startsWith(marker)) count += 1;
    }
  }
  return count;
}

function isTestFile(path: string): boolean {
  return TEST_FILE_GLOBS.some((glob) => minimatch(path, glob, { dot: true }));
}

function baseName(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

function clipHunkText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  let clipped = text.slice(0, maxChars);
  const lastNewline = clipped.lastIndexOf("\n");
  if (lastNewline > maxChars / 2) {
    clipped = clipped.slice(0, lastNewline);
  }
  return { text: clipped, truncated: true };
}

export function summarizeDiff(changeSet: ChangeSet, workflows: WorkflowSpec[], options: SummarizerOptions): DiffSummary {
  const files: SummarizedFile[] = changeSet.files.map((file) => ({
    path: file.path,
    changeKind: file.changeKind,
    ...(file.previousPath ? { previousPath: file.previousPath } : {}),
    additions: countChangedLines(file.hunks, "+"),
    deletions: countChangedLines(file.hunks, "-"),
    ciReferenced: workflows.some((workflow) => workflowReferencesPath(workflow, file.path))
  }));
  const referenced = new Map(files.map((file) => [file.path, file.ciReferenced]));

  const ranked = changeSet.files
    .flatMap((file) =>
      file.hunks.map((hunk) => ({
        path: file.path,
        hunk,
        size: hunkLines(hunk).length,
        ciReferenced: referenced.get(file.path) ?? false
      }))
    )
    .sort(
      (a, b) =>
        Number(b.ciReferenced) - Number(a.ciReferenced) ||
        b.size - a.size ||
        a.path.localeCompare(b.path) ||
        a.hunk.startLine - b.hunk.startLine
    );

  const excerpts = ranked.slice(0, Math.max(0, options.maxExcerpts)).map((entry) => {
    const clipped = clipHunkText(entry.hunk.text, options.maxHunkChars);
    return {
      path: entry.path,
      startLine: entry.hunk.startLine,
      endLine: entry.hunk.endLine,
      text: clipped.text,
      truncated: clipped.truncated
    };
  });

  const paths = changeSet.files.flatMap((file) => (file.previousPath ? [file.path, file.previousPath] : [file.path]));

  return {
    base: changeSet.base,
    head: changeSet.head,
    title: changeSet.metadata.title,
    files,
    excerpts,
    flags: {
      hasCiTrigger: workflows.some((workflow) => workflowRunsFor(workflow, paths)),
      hasTestFileChange: paths.some(isTestFile),
      hasWorkflowFileChange: paths.some((path) => path.startsWith(".github/workflows/")),
      hasDependencyManifestChange: paths.some((path) => DEPENDENCY_MANIFESTS.has(baseName(path)))
    },
    elidedHunks: ranked.length - excerpts.length
  };
}

function renderFileRow(file: SummarizedFile): string {
  const name = file.previousPath ? `${file.previousPath} -> ${file.path}` : file.path;
  const ci = file.ciReferenced ? " [ci-trigger]" : "";
  return `- ${file.changeKind} ${name} (+${file.additions} -${file.deletions})${ci}`;
}

/** Header, complete file inventory and flags; never trimmed by excerpt selection. */
export function renderDiffSummaryCore(summary: DiffSummary): string {
  const { flags } = summary;
  return [
    `Change: ${summary.base}..${summary.head} (${summary.title})`,
    `Changed files (${summary.files.length}):`,
    ...summary.files.map(renderFileRow),
    `Flags: has_ci_trigger=${flags.hasCiTrigger}, has_test_file_change=${flags.hasTestFileChange}, ` +
      `has_workflow_file_change=${flags.hasWorkflowFileChange}, ` +
      `has_dependency_manifest_change=${flags.hasDependencyManifestChange}`
  ].join("\n");
}

export function renderHunkExcerpt(excerpt: HunkExcerpt): string {
  const lines = [`### ${excerpt.path} lines ${excerpt.startLine}-${excerpt.endLine}`, excerpt.text];
  if (excerpt.truncated) lines.push("... (hunk truncated)");
  return lines.join("\n");
}
