// apps/backend/src/export/walk.ts
// One walk over the document model; the HTML view and the DOCX export both consume its output.

import type { Block, ContactBlock, NarrativeDocument } from '../narrative/types.js'
import type { RenderProfile, RenderedBlock, RenderedOutput, SummaryInput } from './types.js'

const HEADING_STYLE = { bold: true, sizePt: 14, alignment: 'left', spaceAfterPt: 10 } as const
const BULLET_STYLE = { spaceAfterPt: 4 } as const

export const SUMMARY_PROFILE: RenderProfile = {
  heading: HEADING_STYLE,
  bullet: BULLET_STYLE,
  paragraph: { alignment: 'justify', spaceAfterPt: 8 },
}

export const APPENDIX_PROFILE: RenderProfile = {
  heading: HEADING_STYLE,
  bullet: BULLET_STYLE,
  paragraph: { alignment: 'justify', spaceAfterPt: 6 },
}

export const CONTEXT_PROFILE: RenderProfile = {
  heading: HEADING_STYLE,
  bullet: BULLET_STYLE,
  paragraph: { alignment: 'left', spaceAfterPt: 6 },
}

export const CONTACT_HEADING = 'Contact Information'
export const NOT_AVAILABLE = 'N/A'

function renderBlock(block: Block, profile: RenderProfile): RenderedBlock {
  if (block.kind === 'bullet') return { kind: 'bullet', text: block.text, style: profile.bullet }
  return { kind: 'paragraph', text: block.text, style: profile.paragraph }
}

export function walkDocument(
  doc: NarrativeDocument,
  profile: RenderProfile = SUMMARY_PROFILE,
  headingLabels: Record<string, string> = {}
): RenderedBlock[] {
  const out: RenderedBlock[] = doc.preamble.map((block) => renderBlock(block, profile))
  for (const section of doc.sections) {
    out.push({
      kind: 'heading',
      key: section.key,
      text: headingLabels[section.key] ?? section.label,
      style: profile.heading,
    })
    for (const block of section.blocks) out.push(renderBlock(block, profile))
  }
  return out
}

function field(value?: string | null): string {
  const trimmed = (value ?? '').trim()
  return trimmed || NOT_AVAILABLE
}

export function contactLines(contact: ContactBlock): string[] {
  return [`Email: ${field(contact.email)}`, `Phone: ${field(contact.phone)}`, `Website: ${field(contact.website)}`]
}

export function renderSummary(input: SummaryInput): RenderedOutput {
  const blocks: RenderedBlock[] = [{ kind: 'title', text: input.title }]
  blocks.push(...walkDocument(input.document, input.profile ?? SUMMARY_PROFILE, input.headingLabels))

  if (input.contact) {
    if (input.breakBeforeContact) blocks.push({ kind: 'break' })
    blocks.push({ kind: 'subheading', text: CONTACT_HEADING })
    for (const line of contactLines(input.contact)) {
      blocks.push({ kind: 'paragraph', text: line, style: { alignment: 'left', spaceAfterPt: 4 } })
    }
  }

  for (const appendix of input.appendices ?? []) {
    blocks.push({ kind: 'break' }, { kind: 'title', text: appendix.title })
    blocks.push(...walkDocument(appendix.document, appendix.profile ?? APPENDIX_PROFILE))
  }

  return { title: input.title, blocks }
}
