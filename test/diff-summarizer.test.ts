import { describe, expect, it } from "vitest";

import { freezeChangeSet } from "../src/core/diff/contracts.js";
import { renderDiffSummaryCore, renderHunkExcerpt, summarizeDiff } from "../src/core/diff/summarizer.js";
import type { ChangeSet, WorkflowSpec } from "../src/core/types.js";

const CHANGE_SET: ChangeSet = freezeChangeSet({
  repoRef: "/repo",
  base: "main",
  head: "feature",
  metadata: { title: "Add API", commitSubjects: ["Add API"] },
  files: [
    { path: "src/api/server.ts", changeKind: "modified", hunks: [{ startLine: 10, endLine: 12, text: " a\n-b\n+c" }] },
    { path: "src/api/server.test.ts", changeKind: "added", hunks: [{ startLine: 1, endLine: 2, text: "+it()\n+expect()" }] },
    { path: "package.json", changeKind: "modified", hunks: [{ startLine: 3, endLine: 3, text: '+  "zod": "^3"' }] },
    {
      path: ".github/workflows/ci.yml",
      changeKind: "modified",
      hunks: [{ startLine: 1, endLine: 2, text: "-on: push\n+on: pull_request" }]
    }
  ]
});

const API_WORKFLOW: WorkflowSpec = {
  name: "API",
  file: ".github/workflows/api.yml",
  triggers: ["push"],
  jobs: [],
  pathGlobs: ["src/api/**"],
  pathIgnoreGlobs: []
};

describe("summarizeDiff", () => {
  it("ranks hunks of workflow-referenced files first, then by size", () => {
    const summary = summarizeDiff(CHANGE_SET, [API_WORKFLOW], { maxExcerpts: 3, maxHunkChars: 1200 });
    expect(summary.excerpts.map((excerpt) => excerpt.path)).toEqual([
      "src/api/server.ts",
      "src/api/server.test.ts",
      ".github/workflows/ci.yml"
    ]);
    expect(summary.elidedHunks).toBe(1);
  });

  it("keeps every file in the inventory even when all hunks are elided", () => {
    const summary = summarizeDiff(CHANGE_SET, [API_WORKFLOW], { maxExcerpts: 0, maxHunkChars: 1200 });
    expect(summary.files).toHaveLength(4);
    expect(summary.excerpts).toEqual([]);
    expect(summary.elidedHunks).toBe(4);
  });

  it("renders the file inventory and flags", () => {
    const summary = summarizeDiff(CHANGE_SET, [API_WORKFLOW], { maxExcerpts: 2, maxHunkChars: 1200 });
    expect(renderDiffSummaryCore(summary)).toBe(
      [
        "Change: main..feature (Add API)",
        "Changed files (4):",
        "- modified src/api/server.ts (+1 -1) [ci-trigger]",
        "- added src/api/server.test.ts (+2 -0) [ci-trigger]",
        "- modified package.json (+1 -0)",
        "- modified .github/workflows/ci.yml (+1 -1)",
        "Flags: has_ci_trigger=true, has_test_file_change=true, has_workflow_file_change=true, " +
          "has_dependency_manifest_change=true"
      ].join("\n")
    );
  });

  it("reports no CI trigger when there are no workflows", () => {
    const summary = summarizeDiff(CHANGE_SET, [], { maxExcerpts: 2, maxHunkChars: 1200 });
    expect(summary.flags.hasCiTrigger).toBe(false);
    expect(summary.files.every((file) => !file.ciReferenced)).toBe(true);
  });

  it("clips long hunks at a line boundary", () => {
    const changeSet = freezeChangeSet({
      ...CHANGE_SET,
      files: [{ path: "f", changeKind: "modified", hunks: [{ startLine: 1, endLine: 3, text: "line one\nline two\nline three" }] }]
    });
    const summary = summarizeDiff(changeSet, [], { maxExcerpts: 5, maxHunkChars: 10 });
    const [excerpt] = summary.excerpts;
    expect(excerpt).toEqual({ path: "f", startLine: 1, endLine: 3, text: "line one", truncated: true });
    if (!excerpt) return;
    expect(renderHunkExcerpt(excerpt)).toBe("### f lines 1-3\nline one\n... (hunk truncated)");
  });
});
