import type { ContactBlock, NarrativeDocument } from '../narrative/types.js'

export type Alignment = 'left' | 'justify'

export type BlockStyle = {
  bold?: boolean
  sizePt?: number
  alignment?: Alignment
  spaceAfterPt: number
}

/** Styles for one walk; appendices use their own */
export type RenderProfile = {
  heading: BlockStyle
  bullet: BlockStyle
  paragraph: BlockStyle
}

export type RenderedBlock =
  | { kind: 'title'; text: string }
  | { kind: 'subheading'; text: string }
  | { kind: 'heading'; key: string; text: string; style: BlockStyle }
  | { kind: 'bullet'; text: string; style: BlockStyle }
  | { kind: 'paragraph'; text: string; style: BlockStyle }
  | { kind: 'break' }

export type RenderedOutput = {
  title: string
  blocks: RenderedBlock[]
}

export type Appendix = {
  title: string
  document: NarrativeDocument
  profile?: RenderProfile
}

export type SummaryInput = {
  title: string
  document: NarrativeDocument
  contact?: ContactBlock | null
  appendices?: Appendix[]
  profile?: RenderProfile
  /** Label overrides by section key, e.g. a provider-bearing heading */
  headingLabels?: Record<string, string>
  breakBeforeContact?: boolean
}
