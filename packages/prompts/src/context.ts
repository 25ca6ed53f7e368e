import type { ClientContext, ProviderProfile } from "./schemas.js";

/** One-paragraph provider summary fed to every prompt */
export function formatProviderProfile(profile: ProviderProfile): string {
  return [
    `${profile.name} (Industry: ${profile.industry ?? ""}).`,
    `Services: ${profile.services ?? ""}.`,
    `Differentiators: ${profile.differentiators ?? ""}.`,
    `Website: ${profile.website ?? ""}.`,
    `Contact: ${profile.contactEmail ?? ""} | ${profile.contactPhone ?? ""}.`,
  ].join(" ");
}

/**
 * Client context as labelled lines. The same text is shown in the result view
 * and exported as the client-context appendix, one line per paragraph.
 */
export function formatClientContext(client: ClientContext): string {
  return [
    `Client Name: ${client.clientName}`,
    `Client Industry: ${client.clientIndustry}`,
    `Goals/Challenges: ${client.goals}`,
    `Proposed Modules: ${client.proposedModules}`,
    `Recipient Role: ${client.recipientRole}`,
    `Execution Model: ${client.executionModel ?? ""}`,
    `Additional Notes: ${client.notes ?? ""}`,
  ].join("\n");
}
