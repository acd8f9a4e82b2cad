export interface FewShotExample {
  title: string;
  change: string;
  evidence: string;
  verdict: unknown;
}

export const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
  {
    title: "Change inside the documented design",
    change: "- modified src/billing/invoice.ts (+14 -3)",
    evidence: "[doc:billing-v2] Invoices are generated by src/billing and rounded half-even.",
    verdict: {
      alignment_score: 0.92,
      violations: [],
      summary: "The change adjusts invoice rounding inside the billing module described by billing-v2.",
      approval_required: false
    }
  },
  {
    title: "New integration the design does not mention",
    change: "- added src/billing/crypto-gateway.ts (+210 -0)\n- modified package.json (+1 -0)",
    evidence: "[doc:billing-v2] Card payments go through the existing card processor only.",
    verdict: {
      alignment_score: 0.35,
      violations: [
        {
          kind: "scope_creep",
          severity: "critical",
          file_path: "src/billing/crypto-gateway.ts",
          description: "Adds a crypto payment gateway that billing-v2 does not cover.",
          recommendation: "Get the gateway added to the approved design or move it to a separate proposal."
        },
        {
          kind: "undocumented_dependency",
          severity: "warning",
          file_path: "package.json",
          description: "Introduces a new runtime dependency for the gateway.",
          recommendation: "Record the dependency and its owner in the design document."
        }
      ],
      summary: "The change introduces a payment channel outside the approved billing design.",
      approval_required: true
    }
  }
];

export function renderFewShotExample(example: FewShotExample, index: number): string {
  return [
    `### Example ${index + 1}: ${example.title}`,
    "Changed files:",
    example.change,
    "Evidence:",
    example.evidence,
    "Verdict:",
    JSON.stringify(example.verdict)
  ].join("\n");
}
