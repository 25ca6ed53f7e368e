// apps/backend/src/lib/draft-store.ts
import type { NarrativeDocument } from '../narrative/types.js'

/** A generation step that fell back to placeholder text */
export type DraftWarning = {
  step: 'vsp' | 'summary'
  message: string
}

export type ProposalDraft = {
  providerId: number
  clientName: string
  /** Labelled client-context lines, exported as an appendix */
  clientContext: string
  /** Normalized Value Selling Points text (or its failure placeholder) */
  vsp: string
  summary: NarrativeDocument
  warnings: DraftWarning[]
  updatedAt: string
}

/**
 * One draft slot per session. Callers keep a single generation or refinement
 * in flight per key; the store does no locking.
 */
export interface DraftStore {
  get(sessionId: string): ProposalDraft | undefined
  put(sessionId: string, draft: ProposalDraft): void
  clear(sessionId: string): void
}

export class InMemoryDraftStore implements DraftStore {
  private readonly slots = new Map<string, ProposalDraft>()

  get(sessionId: string): ProposalDraft | undefined {
    return this.slots.get(sessionId)
  }

  put(sessionId: string, draft: ProposalDraft): void {
    this.slots.set(sessionId, draft)
  }

  clear(sessionId: string): void {
    this.slots.delete(sessionId)
  }
}
