import { describe, expect, it } from "vitest";

import { VERDICT_JSON_SCHEMA } from "../src/core/ai-parsing.js";
import { summarizeDiff } from "../src/core/diff/summarizer.js";
import { BudgetExceededError } from "../src/core/errors.js";
import { NO_EVIDENCE_NOTICE, assemblePrompt, buildRepairPrompt, planSections } from "../src/core/prompt/assembler.js";
import type { PromptInputs } from "../src/core/prompt/assembler.js";
import { TokenBudgetManager } from "../src/core/token-budget.js";
import { SECTION_NAMES } from "../src/core/types.js";
import type { EvidenceChunk } from "../src/core/types.js";
import { paymentsChangeSet } from "./support/fixtures.js";

function chunk(sourceDocId: string, text: string, combinedScore: number): EvidenceChunk {
  return { sourceDocId, text, vectorScore: null, graphDistance: 1, relationalRank: null, combinedScore };
}

const EVIDENCE = [
  chunk("payments-rest", "The payments service exposes a REST API only.", 0.9),
  chunk("ledger-core", "The ledger records every settled payment.", 0.4)
];

function inputs(evidence: EvidenceChunk[] = EVIDENCE): PromptInputs {
  return {
    summary: summarizeDiff(paymentsChangeSet(), [], { maxExcerpts: 5, maxHunkChars: 1200 }),
    evidence,
    schema: VERDICT_JSON_SCHEMA
  };
}

function assemble(manager: TokenBudgetManager, promptInputs = inputs()) {
  const budget = manager.allocate(planSections(promptInputs, manager));
  return { budget, assembled: assemblePrompt(promptInputs, budget, manager) };
}

describe("assemblePrompt", () => {
  it("emits sections in a fixed order", () => {
    const { assembled } = assemble(new TokenBudgetManager({ totalTokens: 100_000 }));
    const positions = ["## Instructions", "## Output schema", "## Change summary", "## Approved design evidence", "## Examples"].map(
      (heading) => assembled.prompt.indexOf(heading)
    );

    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("keeps everything when the budget covers the natural sizes", () => {
    const { assembled } = assemble(new TokenBudgetManager({ totalTokens: 100_000 }));

    expect(assembled.evidenceKept).toEqual(EVIDENCE);
    expect(assembled.evidenceDropped).toBe(0);
    expect(assembled.excerptsDropped).toBe(0);
    expect(assembled.prompt).toContain("[doc:payments-rest score=0.900]\nThe payments service exposes a REST API only.");
    expect(assembled.prompt).toContain("### src/payments/grpc.py lines 10-11");
  });

  it("never uses more than a section reserved", () => {
    const manager = new TokenBudgetManager({ totalTokens: 1_400 });
    const { budget, assembled } = assemble(manager);

    for (const name of SECTION_NAMES) {
      expect(assembled.usage[name] ?? 0).toBeLessThanOrEqual(budget.reserved[name] ?? 0);
    }
    expect(() => manager.commit(budget, assembled.usage)).not.toThrow();
  });

  it("states that no approved design was found when evidence is empty", () => {
    const { assembled } = assemble(new TokenBudgetManager({ totalTokens: 100_000 }), inputs([]));

    expect(assembled.prompt).toContain(NO_EVIDENCE_NOTICE);
    expect(assembled.evidenceKept).toEqual([]);
  });

  it("leaves out few-shot examples for small models", () => {
    const manager = new TokenBudgetManager({ totalTokens: 100_000, fewShotEnabled: false });
    const { budget, assembled } = assemble(manager);

    expect(assembled.prompt).not.toContain("## Examples");
    expect(budget.reserved.few_shot_examples).toBe(0);
    expect(assembled.usage.few_shot_examples).toBe(0);
  });

  it("selects schema decoding when the model supports it", () => {
    const constrained = assemble(new TokenBudgetManager({ totalTokens: 100_000, constrainedDecoding: true })).assembled;
    const freeform = assemble(new TokenBudgetManager({ totalTokens: 100_000 })).assembled;

    expect(constrained.decoding).toBe("schema");
    expect(constrained.prompt).toContain("The response is constrained to this schema.");
    expect(freeform.decoding).toBe("freeform");
    expect(freeform.prompt).toContain("Respond with a single JSON object that matches this schema and nothing else.");
  });

  it("drops lower-ranked evidence whole when its section is tight", () => {
    const manager = new TokenBudgetManager({ totalTokens: 100_000 });
    const promptInputs = inputs([EVIDENCE[0] ?? chunk("x", "x", 1), chunk("huge", "x".repeat(4_000), 0.1)]);
    const budget = manager.allocate(planSections(promptInputs, manager));
    budget.reserved.retrieved_context = 200;

    const assembled = assemblePrompt(promptInputs, budget, manager);
    expect(assembled.evidenceKept.map((kept) => kept.sourceDocId)).toEqual(["payments-rest"]);
    expect(assembled.evidenceDropped).toBe(1);
    expect(assembled.prompt).not.toContain("[doc:huge");
  });

  it("fails when the file inventory alone exceeds the diff reservation", () => {
    const manager = new TokenBudgetManager({ totalTokens: 100_000 });
    const promptInputs = inputs();
    const budget = manager.allocate(planSections(promptInputs, manager));
    budget.reserved.diff_summary = 5;

    expect(() => assemblePrompt(promptInputs, budget, manager)).toThrow(BudgetExceededError);
  });

  it("is deterministic", () => {
    const manager = new TokenBudgetManager({ totalTokens: 2_000 });
    expect(assemble(manager).assembled).toEqual(assemble(manager).assembled);
  });
});

describe("buildRepairPrompt", () => {
  const manager = new TokenBudgetManager({ totalTokens: 10_000 });

  it("appends the problems and the rejected output", () => {
    expect(buildRepairPrompt("BASE", '{"bad":1}', ["alignment_score: Required"], manager)).toBe(
      [
        "BASE",
        "",
        "## Correction required",
        "Your previous response was rejected:",
        "- alignment_score: Required",
        "",
        "Previous response:",
        "```",
        '{"bad":1}',
        "```",
        "",
        "Return one corrected JSON object that satisfies the output schema.",
        "Use only file paths from the changed-file list, or null."
      ].join("\n")
    );
  });

  it("omits the previous response when there was none", () => {
    const prompt = buildRepairPrompt("BASE", null, ["timeout"], manager);
    expect(prompt).not.toContain("Previous response:");
    expect(prompt.startsWith("BASE\n\n## Correction required\n")).toBe(true);
  });
});
