// apps/backend/src/narrative/types.ts

export type ParagraphBlock = { readonly kind: 'paragraph'; readonly text: string }
export type BulletBlock = { readonly kind: 'bullet'; readonly text: string }
export type Block = ParagraphBlock | BulletBlock

export type Section = {
  /** Vocabulary key, stable across provider names */
  readonly key: string
  readonly label: string
  readonly blocks: readonly Block[]
}

export type NarrativeDocument = {
  /** Content seen before the first recognized heading */
  readonly preamble: readonly Block[]
  readonly sections: readonly Section[]
}

export type ContactBlock = {
  email?: string | null
  phone?: string | null
  website?: string | null
}

export type HeadingSpec = {
  readonly key: string
  readonly label: string
  readonly matches: (line: string) => boolean
}

/** Ordered: earlier specs win when several match the same line */
export type HeadingVocabulary = readonly HeadingSpec[]

/**
 * What happens when a heading already seen opens again.
 * - merge: blocks are appended to the first occurrence
 * - last-wins: the later occurrence replaces the blocks, position unchanged
 * - keep-both: a second section is emitted
 */
export type DuplicateHeadingPolicy = 'merge' | 'last-wins' | 'keep-both'

export const paragraph = (text: string): ParagraphBlock => ({ kind: 'paragraph', text })
export const bullet = (text: string): BulletBlock => ({ kind: 'bullet', text })

