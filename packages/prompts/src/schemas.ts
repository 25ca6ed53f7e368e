import { z } from "zod";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const requiredText = (message: string) => z.string({ required_error: message }).trim().min(1, message);

/** Provider profile captured on the setup form */
export const ProviderProfileSchema = z.object({
  name: requiredText("Company name is required"),
  industry: optionalText,
  services: optionalText,
  differentiators: optionalText,
  contactEmail: optionalText,
  contactPhone: optionalText,
  website: optionalText,
  notes: optionalText,
});

export type ProviderProfile = z.infer<typeof ProviderProfileSchema>;

/** Client context captured on the proposal form */
export const ClientContextSchema = z.object({
  clientName: requiredText("Client Name is required."),
  clientIndustry: requiredText("Client Industry is required."),
  goals: requiredText("Client Goals / Challenges are required."),
  proposedModules: requiredText("Proposed Solutions / Modules are required."),
  recipientRole: requiredText("Recipient Role is required."),
  executionModel: optionalText,
  notes: optionalText,
});

export type ClientContext = z.infer<typeof ClientContextSchema>;

export const ProposalRequestSchema = ClientContextSchema.extend({
  providerId: z.coerce
    .number({ invalid_type_error: "Please select a provider." })
    .int("Please select a provider.")
    .positive("Please select a provider."),
});

export type ProposalRequest = z.infer<typeof ProposalRequestSchema>;

export const RefineRequestSchema = z.object({
  instructions: z.string().trim().default(""),
});

export type RefineRequest = z.infer<typeof RefineRequestSchema>;
