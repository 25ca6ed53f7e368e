// apps/backend/src/orchestrator/summary-output.ts
import { CONTEXT_PROFILE, renderSummary } from '../export/walk.js'
import type { Appendix, RenderedOutput } from '../export/types.js'
import type { ProposalDraft } from '../lib/draft-store.js'
import { contactFromProvider, type ProviderRecord } from '../lib/provider-store.js'
import { classify, providerDisplayName, valueSellingPointHeadings } from '../narrative/index.js'

export type ExportSettings = {
  includeVsp: boolean
}

export function summaryTitle(provider: ProviderRecord | null): string {
  return `Executive Summary by ${providerDisplayName(provider?.name)}`
}

/** Title and body only; what the result page shows */
export function buildViewOutput(draft: ProposalDraft, provider: ProviderRecord | null): RenderedOutput {
  return renderSummary({ title: summaryTitle(provider), document: draft.summary })
}

/** Downloadable document: body, contact block (N/A lines without a provider), VSP and client-context appendices */
export function buildExportOutput(
  draft: ProposalDraft,
  provider: ProviderRecord | null,
  settings: ExportSettings
): RenderedOutput {
  const name = providerDisplayName(provider?.name)
  const appendices: Appendix[] = []

  if (settings.includeVsp && draft.vsp.trim()) {
    appendices.push({
      title: `Value Selling Points by ${name}`,
      document: classify(draft.vsp, valueSellingPointHeadings(name)),
    })
  }
  if (draft.clientContext.trim()) {
    appendices.push({
      title: 'Client Context',
      document: classify(draft.clientContext, []),
      profile: CONTEXT_PROFILE,
    })
  }

  return renderSummary({
    title: summaryTitle(provider),
    document: draft.summary,
    contact: provider ? contactFromProvider(provider) : {},
    appendices,
  })
}
