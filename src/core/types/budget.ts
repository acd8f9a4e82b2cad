export const SECTION_NAMES = [
  "system_instructions",
  "output_schema",
  "diff_summary",
  "retrieved_context",
  "few_shot_examples"
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export type SectionPriority = "fixed" | "high" | "medium" | "low";

export interface SectionRequest {
  name: SectionName;
  priority: SectionPriority;
  /** Tokens the section would take untrimmed. */
  naturalTokens: number;
}

export interface Budget {
  totalTokens: number;
  reserved: Partial<Record<SectionName, number>>;
  used: Partial<Record<SectionName, number>>;
}
