import { describe, expect, it } from "vitest";

import { MODEL_PROFILES } from "../src/core/config.js";
import { BudgetExceededError } from "../src/core/errors.js";
import { TokenBudgetManager, estimateTokens } from "../src/core/token-budget.js";
import { SECTION_NAMES } from "../src/core/types.js";
import type { Budget, SectionRequest } from "../src/core/types.js";

function sumReserved(budget: Budget): number {
  return SECTION_NAMES.reduce((sum, name) => sum + (budget.reserved[name] ?? 0), 0);
}

const SECTIONS: SectionRequest[] = [
  { name: "system_instructions", priority: "fixed", naturalTokens: 100 },
  { name: "output_schema", priority: "fixed", naturalTokens: 50 },
  { name: "diff_summary", priority: "high", naturalTokens: 2000 },
  { name: "retrieved_context", priority: "medium", naturalTokens: 2000 },
  { name: "few_shot_examples", priority: "low", naturalTokens: 2000 }
];

describe("token estimation", () => {
  it("counts 3.5 characters per token, rounding up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abc")).toBe(1);
    expect(estimateTokens("abcdefg")).toBe(2);
    expect(estimateTokens("abcdefgh")).toBe(3);
  });
});

describe("TokenBudgetManager.allocate", () => {
  it("honors fixed sections first and splits the rest by weight", () => {
    const manager = new TokenBudgetManager({ totalTokens: 750 });
    const budget = manager.allocate(SECTIONS);

    expect(budget.reserved).toEqual({
      system_instructions: 100,
      output_schema: 50,
      diff_summary: 300,
      retrieved_context: 200,
      few_shot_examples: 100
    });
    expect(sumReserved(budget)).toBeLessThanOrEqual(budget.totalTokens);
  });

  it("never reserves more than a section's natural length and redistributes the surplus", () => {
    const manager = new TokenBudgetManager({ totalTokens: 1000 });
    const budget = manager.allocate([
      { name: "system_instructions", priority: "fixed", naturalTokens: 100 },
      { name: "diff_summary", priority: "high", naturalTokens: 60 },
      { name: "retrieved_context", priority: "medium", naturalTokens: 5000 },
      { name: "few_shot_examples", priority: "low", naturalTokens: 5000 }
    ]);

    expect(budget.reserved.diff_summary).toBe(60);
    // 840 left after the capped diff section: 2/3 and 1/3.
    expect(budget.reserved.retrieved_context).toBe(560);
    expect(budget.reserved.few_shot_examples).toBe(280);
    expect(sumReserved(budget)).toBeLessThanOrEqual(1000);
  });

  it("gives every section its natural length when everything fits", () => {
    const manager = new TokenBudgetManager({ totalTokens: 100_000 });
    const budget = manager.allocate(SECTIONS);
    expect(budget.reserved.diff_summary).toBe(2000);
    expect(budget.reserved.retrieved_context).toBe(2000);
    expect(budget.reserved.few_shot_examples).toBe(2000);
    expect(budget.used).toEqual({
      system_instructions: 0,
      output_schema: 0,
      diff_summary: 0,
      retrieved_context: 0,
      few_shot_examples: 0
    });
  });

  it("fails with BudgetExceeded when fixed sections alone overflow", () => {
    const manager = new TokenBudgetManager({ totalTokens: 120 });
    expect(() => manager.allocate(SECTIONS)).toThrow(BudgetExceededError);
  });

  it("reserves nothing for few-shot examples in the small-model profile", () => {
    const manager = TokenBudgetManager.forProfile(MODEL_PROFILES.small);
    expect(manager.totalTokens).toBe(4096);
    expect(manager.constrainedDecoding).toBe(true);

    const budget = manager.allocate(SECTIONS);
    expect(budget.reserved.few_shot_examples).toBe(0);
    expect(budget.reserved.diff_summary).toBe(2000);
    expect(budget.reserved.retrieved_context).toBe(1946);
    expect(sumReserved(budget)).toBeLessThanOrEqual(budget.totalTokens);
  });

  it("keeps the sum of reservations within the total across many shapes", () => {
    for (const totalTokens of [150, 151, 397, 1024, 4096, 9999]) {
      for (const natural of [1, 37, 500, 4000]) {
        const manager = new TokenBudgetManager({ totalTokens });
        const budget = manager.allocate(SECTIONS.map((section) =>
          section.priority === "fixed" ? section : { ...section, naturalTokens: natural }
        ));
        expect(sumReserved(budget)).toBeLessThanOrEqual(totalTokens);
        for (const section of SECTIONS) {
          if (section.priority === "fixed") continue;
          expect(budget.reserved[section.name] ?? 0).toBeLessThanOrEqual(natural);
        }
      }
    }
  });
});

describe("TokenBudgetManager fitting", () => {
  const manager = new TokenBudgetManager({ totalTokens: 1000 });

  it("returns text untouched when it fits", () => {
    expect(manager.fit("short text", 10)).toBe("short text");
  });

  it("truncates at a line boundary and marks the cut", () => {
    const text = ["alpha line", "bravo line", "charlie line", "delta line"].join("\n");
    const fitted = manager.fit(text, 12);
    expect(fitted).toBe("alpha line\nbravo line\n...(truncated)");
    expect(estimateTokens(fitted)).toBeLessThanOrEqual(12);
  });

  it("drops lower-ranked chunks wholesale instead of cutting one", () => {
    const items = ["a".repeat(35), "b".repeat(35), "c".repeat(35)];
    const fitted = manager.fitChunks(items, 20, (item) => item);
    expect(fitted.kept).toEqual([items[0]]);
    expect(fitted.dropped).toBe(2);
    expect(fitted.text).toBe("a".repeat(35));
  });

  it("records usage and refuses usage above the reservation", () => {
    const budget = manager.allocate(SECTIONS);
    manager.commit(budget, { system_instructions: 100, diff_summary: 12 });
    expect(budget.used.diff_summary).toBe(12);
    expect(() => manager.commit(budget, { output_schema: 51 })).toThrow(BudgetExceededError);
    expect(budget.used.output_schema).toBe(0);
  });
});
