import { BudgetExceededError } from "./errors.js";
import type { ModelProfile } from "./config.js";
import { SECTION_NAMES } from "./types.js";
import type { Budget, SectionName, SectionPriority, SectionRequest } from "./types.js";

// Sub-word tokenizers average ~4 chars/token on English; 3.5 over-counts slightly on purpose.
const CHARS_PER_TOKEN = 3.5;
const TRUNCATION_SUFFIX = "\n...(truncated)";

export const FEW_SHOT_SECTION: SectionName = "few_shot_examples";

export const PRIORITY_WEIGHTS: Record<Exclude<SectionPriority, "fixed">, number> = {
  high: 3,
  medium: 2,
  low: 1
};

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export interface FittedChunks<T> {
  kept: T[];
  dropped: number;
  text: string;
}

export class TokenBudgetManager {
  readonly totalTokens: number;
  readonly fewShotEnabled: boolean;
  readonly constrainedDecoding: boolean;

  constructor(options: { totalTokens: number; fewShotEnabled?: boolean; constrainedDecoding?: boolean }) {
    this.totalTokens = Math.max(0, Math.floor(options.totalTokens));
    this.fewShotEnabled = options.fewShotEnabled ?? true;
    this.constrainedDecoding = options.constrainedDecoding ?? false;
  }

  static forProfile(profile: ModelProfile): TokenBudgetManager {
    return new TokenBudgetManager({
      totalTokens: profile.contextTokens - profile.maxOutputTokens,
      fewShotEnabled: profile.fewShotEnabled,
      constrainedDecoding: profile.constrainedDecoding
    });
  }

  allocate(sections: SectionRequest[]): Budget {
    const reserved: Partial<Record<SectionName, number>> = {};
    const used: Partial<Record<SectionName, number>> = {};

    let fixedTotal = 0;
    for (const section of sections) {
      used[section.name] = 0;
      if (section.priority !== "fixed") continue;
      reserved[section.name] = section.naturalTokens;
      fixedTotal += section.naturalTokens;
    }
    if (fixedTotal > this.totalTokens) {
      throw new BudgetExceededError(
        `Fixed prompt sections need ${fixedTotal} tokens but the model budget is ${this.totalTokens}.`,
        { details: { fixedTokens: fixedTotal, totalTokens: this.totalTokens } }
      );
    }

    let remaining = this.totalTokens - fixedTotal;
    let open: Array<SectionRequest & { priority: Exclude<SectionPriority, "fixed"> }> = [];
    for (const section of sections) {
      if (section.priority === "fixed") continue;
      reserved[section.name] = 0;
      if (section.name === FEW_SHOT_SECTION && !this.fewShotEnabled) continue;
      open.push({ ...section, priority: section.priority });
    }

    // Water-filling: sections that need less than their weighted share are satisfied
    // and their surplus goes back to the pool until nobody is capped.
    while (open.length > 0 && remaining > 0) {
      const weightSum = open.reduce((sum, section) => sum + PRIORITY_WEIGHTS[section.priority], 0);
      const shareOf = (section: (typeof open)[number]): number =>
        Math.floor((remaining * PRIORITY_WEIGHTS[section.priority]) / weightSum);

      const satisfied = open.filter((section) => section.naturalTokens <= shareOf(section));
      if (satisfied.length === 0) {
        for (const section of open) {
          reserved[section.name] = shareOf(section);
        }
        break;
      }

      let granted = 0;
      for (const section of satisfied) {
        reserved[section.name] = section.naturalTokens;
        granted += section.naturalTokens;
      }
      remaining -= granted;
      open = open.filter((section) => !satisfied.includes(section));
    }

    return { totalTokens: this.totalTokens, reserved, used };
  }

  fit(text: string, maxTokens: number): string {
    if (estimateTokens(text) <= maxTokens) return text;
    const maxChars = Math.floor(Math.max(0, maxTokens) * CHARS_PER_TOKEN);
    const available = maxChars - TRUNCATION_SUFFIX.length;
    if (available <= 0) return "";

    let truncated = text.slice(0, available);
    const lastNewline = truncated.lastIndexOf("\n");
    if (lastNewline > available / 2) {
      truncated = truncated.slice(0, lastNewline);
    }
    return `${truncated}${TRUNCATION_SUFFIX}`;
  }

  /** Keeps the longest rank-ordered prefix that fits; lower-ranked items are dropped whole. */
  fitChunks<T>(items: readonly T[], maxTokens: number, render: (item: T) => string, separator = "\n\n"): FittedChunks<T> {
    const kept: T[] = [];
    let text = "";
    for (const item of items) {
      const rendered = render(item);
      const candidate = text ? `${text}${separator}${rendered}` : rendered;
      if (estimateTokens(candidate) > maxTokens) break;
      kept.push(item);
      text = candidate;
    }
    return { kept, dropped: items.length - kept.length, text };
  }

  commit(budget: Budget, usage: Partial<Record<SectionName, number>>): void {
    for (const name of SECTION_NAMES) {
      const tokens = usage[name];
      if (tokens === undefined) continue;
      const limit = budget.reserved[name] ?? 0;
      if (tokens > limit) {
        throw new BudgetExceededError(`Section ${name} uses ${tokens} tokens but only ${limit} were reserved.`, {
          details: { section: name, tokens, reserved: limit }
        });
      }
    }
    for (const name of SECTION_NAMES) {
      const tokens = usage[name];
      if (tokens !== undefined) budget.used[name] = tokens;
    }
  }

  describe(budget: Budget): string {
    const used = Object.values(budget.used).reduce((sum, value) => sum + (value ?? 0), 0);
    const sections = SECTION_NAMES.filter((name) => budget.reserved[name] !== undefined)
      .map((name) => `${name}=${budget.used[name] ?? 0}/${budget.reserved[name] ?? 0}`)
      .join(", ");
    return `total=${budget.totalTokens}, used=${used} | ${sections}`;
  }
}
