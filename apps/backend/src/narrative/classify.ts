// apps/backend/src/narrative/classify.ts
import type {
  Block,
  DuplicateHeadingPolicy,
  HeadingSpec,
  HeadingVocabulary,
  NarrativeDocument,
  Section,
} from './types.js'

export type ClassifyOptions = {
  duplicates?: DuplicateHeadingPolicy
}

export const DEFAULT_DUPLICATE_POLICY: DuplicateHeadingPolicy = 'merge'

const BULLET_MARKER = '- '

export function matchHeading(line: string, vocabulary: HeadingVocabulary): HeadingSpec | null {
  for (const heading of vocabulary) {
    if (heading.matches(line)) return heading
  }
  return null
}

export function blockFromLine(line: string): Block {
  if (line === BULLET_MARKER.trim() || line.startsWith(BULLET_MARKER)) {
    return { kind: 'bullet', text: line.slice(BULLET_MARKER.length).trim() }
  }
  return { kind: 'paragraph', text: line }
}

type OpenSection = { key: string; label: string; blocks: Block[] }

/**
 * Splits normalized text into sections. One open section at a time; a heading
 * line closes it and opens the next, any other non-blank line becomes a block
 * of the open section (or of the preamble before the first heading).
 */
export function classify(
  text: string,
  vocabulary: HeadingVocabulary,
  options: ClassifyOptions = {}
): NarrativeDocument {
  const policy = options.duplicates ?? DEFAULT_DUPLICATE_POLICY
  const preamble: Block[] = []
  const sections: OpenSection[] = []
  let current: OpenSection | null = null

  for (const raw of String(text || '').split('\n')) {
    const line = raw.trim()
    if (!line) continue

    const heading = matchHeading(line, vocabulary)
    if (heading) {
      const seen = policy === 'keep-both' ? undefined : sections.find((s) => s.key === heading.key)
      if (seen) {
        if (policy === 'last-wins') seen.blocks = []
        current = seen
      } else {
        current = { key: heading.key, label: heading.label, blocks: [] }
        sections.push(current)
      }
      continue
    }

    const block = blockFromLine(line)
    if (!block.text) continue
    if (current) current.blocks.push(block)
    else preamble.push(block)
  }

  return {
    preamble,
    sections: sections.map((s): Section => ({ key: s.key, label: s.label, blocks: s.blocks })),
  }
}
