/**
 * Consultant: senior management consultant voice used for every proposal task.
 * Exports: `system(task)` and `roleEmphasis(role)`.
 */

export type ProposalTask = "VSP" | "EXECUTIVE_SUMMARY" | "REFINE";

export function system(task: ProposalTask): string {
  switch (task) {
    case "VSP":
      return "You are an expert proposal writer.";
    case "EXECUTIVE_SUMMARY":
      return "You are a senior management consultant writing client-ready executive summaries.";
    case "REFINE":
      return "You are a professional consultant refining executive summaries.";
  }
}

const ROLE_EMPHASIS: Array<[RegExp, string]> = [
  [/\bceo\b|chief executive/i, "innovation, long-term strategic advantage, and market leadership"],
  [/\bcfo\b|chief financial|finance/i, "ROI, cost savings, margin improvement, EBITDA impact, and financial resilience"],
  [/\bcio\b|\bcto\b|chief (information|technology)/i, "technical robustness, scalability, integration, compliance, and innovation in IT systems"],
  [/head of sales|\bcmo\b|chief marketing/i, "business value, revenue growth, customer experience, and competitive differentiation"],
  [/operations/i, "efficiency, risk mitigation, governance, and process excellence"],
];

/** Focus areas for the recipient; unknown roles leave the inference to the model */
export function roleEmphasis(role: string): string | null {
  for (const [rx, emphasis] of ROLE_EMPHASIS) {
    if (rx.test(role)) return emphasis;
  }
  return null;
}

export const ROLE_GUIDANCE = `
Adapt tone, vocabulary, and emphasis to the Recipient Role in the client context. Keep the shifts subtle; it is still an executive summary.
- CEO: innovation, long-term strategic advantage, and market leadership.
- CFO: ROI, cost savings, margin improvement, EBITDA impact, and financial resilience.
- CIO/CTO: technical robustness, scalability, integration, compliance, and innovation in IT systems.
- Head of Sales / CMO: business value, revenue growth, customer experience, and competitive differentiation.
- Operations Director: efficiency, risk mitigation, governance, and process excellence.
- Other roles: infer the focus areas while keeping clarity and professionalism.
`.trim();
