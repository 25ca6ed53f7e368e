// ESM + NodeNext: include .js on local imports
export {
  ProviderProfileSchema,
  ClientContextSchema,
  ProposalRequestSchema,
  RefineRequestSchema,
} from "./schemas.js";

export type {
  ProviderProfile,
  ClientContext,
  ProposalRequest,
  RefineRequest,
} from "./schemas.js";

export { formatProviderProfile, formatClientContext } from "./context.js";
export { buildVspPrompt } from "./value-selling-points.js";
export { buildExecutiveSummaryPrompt, executiveSummaryOutline } from "./executive-summary.js";
export { buildRefinePrompt } from "./refine.js";
export { system, roleEmphasis } from "./agents/consultant.js";

export type { VspPromptInput } from "./value-selling-points.js";
export type { ExecutiveSummaryPromptInput } from "./executive-summary.js";
export type { RefinePromptInput } from "./refine.js";
export type { ProposalTask } from "./agents/consultant.js";
