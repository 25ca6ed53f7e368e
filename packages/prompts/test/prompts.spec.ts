import { describe, it, expect } from "vitest";
import {
  buildExecutiveSummaryPrompt,
  buildRefinePrompt,
  buildVspPrompt,
  executiveSummaryOutline,
  formatClientContext,
  formatProviderProfile,
  roleEmphasis,
  system,
} from "../src/index.js";

describe("formatters", () => {
  it("formats the provider profile on one line", () => {
    expect(
      formatProviderProfile({
        name: "Northwind",
        industry: "IT",
        services: "Cloud",
        differentiators: "ISO 27001",
        website: "northwind.example",
        contactEmail: "hi@northwind.example",
        contactPhone: "555-0100",
      })
    ).toBe(
      "Northwind (Industry: IT). Services: Cloud. Differentiators: ISO 27001. Website: northwind.example. Contact: hi@northwind.example | 555-0100."
    );
  });

  it("formats client context as labelled lines", () => {
    const text = formatClientContext({
      clientName: "Harbor Clinics",
      clientIndustry: "Healthcare",
      goals: "Shorter waits",
      proposedModules: "Scheduling",
      recipientRole: "CEO",
    });
    expect(text.split("\n")).toEqual([
      "Client Name: Harbor Clinics",
      "Client Industry: Healthcare",
      "Goals/Challenges: Shorter waits",
      "Proposed Modules: Scheduling",
      "Recipient Role: CEO",
      "Execution Model: ",
      "Additional Notes: ",
    ]);
  });
});

describe("prompt builders", () => {
  it("names the provider in the VSP structure", () => {
    const prompt = buildVspPrompt({ providerName: "Northwind", providerProfile: "P", clientContext: "C" });
    expect(prompt).toContain("\nNorthwind Proposed Solution\n");
    expect(prompt.endsWith("CLIENT_CONTEXT:\nC")).toBe(true);
  });

  it("lists the outline in order and adds the recipient focus", () => {
    const prompt = buildExecutiveSummaryPrompt({
      providerName: "Northwind",
      providerProfile: "P",
      vsp: "V",
      clientContext: "C",
      recipientRole: "CFO",
    });
    expect(prompt).toContain("  6) Why Northwind\n  7) Closing Call-to-Action");
    expect(prompt).toContain(
      "- For this recipient, lead with ROI, cost savings, margin improvement, EBITDA impact, and financial resilience."
    );
  });

  it("embeds instructions and draft in the refine prompt", () => {
    const prompt = buildRefinePrompt({ providerName: "Northwind", instructions: "Shorter", draft: "Introduction\nHello" });
    expect(prompt.startsWith("Refine the Executive Summary below using these instructions exactly:\nShorter")).toBe(true);
    expect(prompt).toContain("Why Northwind.");
  });

  it("keeps the outline stable", () => {
    expect(executiveSummaryOutline("Acme")[5]).toBe("Why Acme");
  });
});

describe("consultant agent", () => {
  it("resolves role emphasis", () => {
    expect(roleEmphasis("Operations Director")).toBe("efficiency, risk mitigation, governance, and process excellence");
    expect(roleEmphasis("Head of Procurement")).toBeNull();
  });

  it("has a system message per task", () => {
    expect(system("REFINE")).toBe("You are a professional consultant refining executive summaries.");
  });
});
