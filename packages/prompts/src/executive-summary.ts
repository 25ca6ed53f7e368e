import { ROLE_GUIDANCE, roleEmphasis } from "./agents/consultant.js";

export type ExecutiveSummaryPromptInput = {
  providerName: string;
  providerProfile: string;
  website?: string;
  vsp: string;
  clientContext: string;
  recipientRole?: string;
};

/** Heading order the model is asked to follow; the classifier does not depend on it */
export function executiveSummaryOutline(providerName: string): string[] {
  return [
    "Introduction",
    "Our Understanding of Your Goals",
    "Our Approach to Meeting Your Goals",
    "Solution Overview",
    "How We Will Deliver",
    `Why ${providerName}`,
    "Closing Call-to-Action",
  ];
}

export function buildExecutiveSummaryPrompt(input: ExecutiveSummaryPromptInput): string {
  const outline = executiveSummaryOutline(input.providerName)
    .map((heading, i) => `  ${i + 1}) ${heading}`)
    .join("\n");
  const focus = input.recipientRole ? roleEmphasis(input.recipientRole) : null;

  return `
You are a senior management consultant. Using the provider profile and the VSP, produce a polished,
client-ready Executive Summary in well formatted plain text (no Markdown, no ##, no **).
Match the business-driven, persuasive style of the VSP: sharp, opportunity-focused, executive-level.

Requirements:
- Length: 600-900 words.
- Use EXACTLY these headings once, in order:
${outline}
- Headings must appear exactly once and in order. Do not repeat any heading.
- Frame the client positively (readiness/opportunity). Avoid weakness/problem language.
- Use "-" for bullets. No other symbols. No Markdown. No placeholders.
- Do not invent facts. Reuse exact phrases from the VSP, especially in Solution Overview, How We Will Deliver and Why ${input.providerName}.
${ROLE_GUIDANCE}${focus ? `\n- For this recipient, lead with ${focus}.` : ""}

Section specifics:
- Our Approach to Meeting Your Goals: a two-line statement followed by 3-4 explanatory bullets mapping client goals to approach elements and measurable business outcomes.
- Solution Overview: 3-5 bullets. Every bullet reuses at least one exact phrase from the VSP "Proposed Solution" and maps the module to an explicit business outcome.
- How We Will Deliver: 3-5 bullets on governance cadence, risk mitigation, phased rollout, joint ownership and enablement, each tied to measurement.
- Why ${input.providerName}: 3-5 bullets reusing differentiators from the provider profile and VSP, each stating its client value.
- Closing Call-to-Action: 2-3 formal sentences inviting a next-step meeting.

Inputs:
- PROVIDER_PROFILE:
${input.providerProfile}
- VSP:
${input.vsp}
- Website of provider:
${input.website ?? ""}
- CLIENT_CONTEXT:
${input.clientContext}
`.trim();
}
