// apps/backend/src/narrative/splice.ts
import { CLOSING_KEY, CLOSING_LABEL, closingHeading } from './headings.js'
import type { Block, NarrativeDocument, Section } from './types.js'

export type SpliceOptions = {
  key?: string
  label?: string
  /** Leftover closing text the classifier kept as plain content */
  isFragment?: (block: Block) => boolean
}

// "7) Closing ..." or "Closing: ..." left in the body by the model
const NUMBERED_CLOSING_RX = /^\(?\d{1,2}[.)]\s*closing\b/i
const LABELLED_CLOSING_RX = /^closing\s*[:\-–—]/i

const matchesClosingHeading = closingHeading().matches

/** Closing text the classifier kept as a paragraph. Bullets are always content. */
export function isClosingFragment(block: Block): boolean {
  if (block.kind !== 'paragraph') return false
  const text = block.text.trim()
  return NUMBERED_CLOSING_RX.test(text) || LABELLED_CLOSING_RX.test(text) || matchesClosingHeading(text)
}

function truncateAtFragment(blocks: readonly Block[], isFragment: (block: Block) => boolean): readonly Block[] {
  const at = blocks.findIndex(isFragment)
  return at === -1 ? blocks : blocks.slice(0, at)
}

/**
 * Replaces whatever closing the model wrote with the canonical one. Every
 * closing section goes, trailing closing fragments in the last remaining
 * section (or the preamble) are cut, and exactly one closing section holding
 * `cta` is appended. Running it on its own output changes nothing.
 */
export function spliceClosing(
  doc: NarrativeDocument,
  cta: readonly Block[],
  options: SpliceOptions = {}
): NarrativeDocument {
  const key = options.key ?? CLOSING_KEY
  const label = options.label ?? CLOSING_LABEL
  const isFragment = options.isFragment ?? isClosingFragment

  const kept: Section[] = doc.sections.filter((section) => section.key !== key)
  let preamble = doc.preamble
  const last = kept[kept.length - 1]
  if (last) {
    kept[kept.length - 1] = { ...last, blocks: truncateAtFragment(last.blocks, isFragment) }
  } else {
    preamble = truncateAtFragment(preamble, isFragment)
  }

  const closing: Section = { key, label, blocks: cta.map((block) => ({ ...block })) }
  return { preamble: [...preamble], sections: [...kept, closing] }
}

export type CallToActionInput = {
  providerName?: string | null
  clientName?: string | null
}

/** Canonical call-to-action text; never left to the model */
export function buildClosingCallToAction({ providerName, clientName }: CallToActionInput): Block[] {
  const provider = (providerName ?? '').trim() || 'Provider'
  const client = (clientName ?? '').trim() || 'the client'
  return [
    {
      kind: 'paragraph',
      text:
        `${provider} recommends moving forward with a phased engagement to realize measurable operational efficiencies within the first year. ` +
        `We are prepared to initiate governance reviews, align executive stakeholders, and formalize next steps to ensure ${client} achieves ` +
        'sustainable improvements in patient satisfaction, cost efficiency, and compliance readiness.',
    },
  ]
}
