export type RefinePromptInput = {
  providerName: string;
  instructions: string;
  draft: string;
};

export function buildRefinePrompt(input: RefinePromptInput): string {
  return `
Refine the Executive Summary below using these instructions exactly:
${input.instructions}

Executive Summary:
${input.draft}

Rules:
- Keep section order intact (Introduction -> ... -> Closing Call-to-Action).
- Reuse VSP phrases in Solution Overview, How We Will Deliver, and Why ${input.providerName}.
- Use "-" for bullets where bullets already exist.
- Do NOT add Markdown or placeholders.
- Preserve the existing Closing Call-to-Action format and contact details.
`.trim();
}
