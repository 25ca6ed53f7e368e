// apps/backend/src/narrative/plain-text.ts
import type { Block, NarrativeDocument } from './types.js'

function blockLine(block: Block): string {
  return block.kind === 'bullet' ? `- ${block.text}` : block.text
}

/**
 * Plain-text form of a document: heading line, then its blocks, sections
 * separated by a blank line. Classifying the result with the same vocabulary
 * gives back an equivalent document.
 */
export function serializeDocument(doc: NarrativeDocument): string {
  const parts: string[] = []
  if (doc.preamble.length) parts.push(doc.preamble.map(blockLine).join('\n'))
  for (const section of doc.sections) {
    parts.push([section.label, ...section.blocks.map(blockLine)].join('\n'))
  }
  return parts.join('\n\n')
}
