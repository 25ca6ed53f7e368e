export type VspPromptInput = {
  providerName: string;
  providerProfile: string;
  clientContext: string;
};

export function buildVspPrompt(input: VspPromptInput): string {
  return `
You are a senior management consultant. Based on the provider profile and client context,
generate a Value Selling Points (VSP) document.

Guidelines:
- Plain text only (no Markdown, no symbols).
- Each bullet must be a strong business phrase (1-2 lines).
- Structure exactly:

Case for Change
- ...
Business Value for the Client
- ...
${input.providerName} Proposed Solution
- ...

Inputs:
PROVIDER_PROFILE:
${input.providerProfile}

CLIENT_CONTEXT:
${input.clientContext}
`.trim();
}
