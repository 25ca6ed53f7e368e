// apps/backend/src/orchestrator/proposal.ts
// Generation and refinement around the narrative pipeline. Model calls happen
// here; the pipeline only ever sees resolved text.

import {
  buildExecutiveSummaryPrompt,
  buildRefinePrompt,
  buildVspPrompt,
  formatClientContext,
  formatProviderProfile,
  system,
  type ClientContext,
} from '@proposal-desk/prompts'
import type { AppConfig } from '../lib/config.js'
import type { DraftWarning, ProposalDraft } from '../lib/draft-store.js'
import { RefineInputEmptyError } from '../lib/errors.js'
import { generateOrPlaceholder, type GenerateText } from '../lib/generate.js'
import type { ProviderRecord } from '../lib/provider-store.js'
import {
  buildClosingCallToAction,
  classify,
  executiveSummaryHeadings,
  normalize,
  providerDisplayName,
  serializeDocument,
  spliceClosing,
  type NarrativeDocument,
} from '../narrative/index.js'

export type ProposalDeps = {
  generate: GenerateText
  generation: AppConfig['generation']
}

/** Raw summary text → canonical document with the canonical closing */
export function assembleSummary(raw: string, providerName: string | null | undefined, clientName: string): NarrativeDocument {
  const doc = classify(normalize(raw), executiveSummaryHeadings(providerName))
  return spliceClosing(doc, buildClosingCallToAction({ providerName: providerDisplayName(providerName), clientName }))
}

export async function createProposal(
  provider: ProviderRecord,
  client: ClientContext,
  deps: ProposalDeps
): Promise<ProposalDraft> {
  const providerProfile = formatProviderProfile(provider)
  const clientContext = formatClientContext(client)

  const vspResult = await generateOrPlaceholder(
    deps.generate,
    'VSP',
    buildVspPrompt({ providerName: provider.name, providerProfile, clientContext }),
    { ...deps.generation.vsp, system: system('VSP'), step: 'vsp' }
  )
  const vsp = normalize(vspResult.text)
  const warnings: DraftWarning[] = []
  if (vspResult.failed) warnings.push({ step: 'vsp', message: vspResult.text })

  const summaryResult = await generateOrPlaceholder(
    deps.generate,
    'Executive Summary',
    buildExecutiveSummaryPrompt({
      providerName: provider.name,
      providerProfile,
      website: provider.website,
      vsp,
      clientContext,
      recipientRole: client.recipientRole,
    }),
    { ...deps.generation.summary, system: system('EXECUTIVE_SUMMARY'), step: 'summary' }
  )
  if (summaryResult.failed) warnings.push({ step: 'summary', message: summaryResult.text })

  return {
    providerId: provider.id,
    clientName: client.clientName,
    clientContext,
    vsp,
    summary: assembleSummary(summaryResult.text, provider.name, client.clientName),
    warnings,
    updatedAt: new Date().toISOString(),
  }
}

/**
 * One refinement pass. Empty instructions are rejected before any model call;
 * a GenerationError propagates so the caller can keep the current draft.
 */
export async function refineProposal(
  draft: ProposalDraft,
  provider: ProviderRecord | null,
  instructions: string,
  deps: ProposalDeps
): Promise<ProposalDraft> {
  const trimmed = instructions.trim()
  if (!trimmed) throw new RefineInputEmptyError()

  const providerName = providerDisplayName(provider?.name)
  const raw = await deps.generate(
    buildRefinePrompt({ providerName, instructions: trimmed, draft: serializeDocument(draft.summary) }),
    { ...deps.generation.summary, system: system('REFINE'), step: 'refine' }
  )

  return {
    ...draft,
    summary: assembleSummary(raw, providerName, draft.clientName),
    // a refined summary replaces the placeholder; a failed VSP still stands
    warnings: draft.warnings.filter((warning) => warning.step !== 'summary'),
    updatedAt: new Date().toISOString(),
  }
}
