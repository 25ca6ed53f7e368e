// apps/backend/src/narrative/headings.ts
// Heading vocabularies are configuration: classification and rendering read the same tables.

import type { HeadingSpec, HeadingVocabulary } from './types.js'

export type HeadingMatcherOptions = {
  /** Canonical label; a line starting with it may carry a few extra words */
  label: string
  /** Shorter line openings that also count, matched at a word boundary */
  prefixes: string[]
  /** Extra words allowed after the full label */
  labelSlack?: number
  /** Extra words allowed after a prefix */
  prefixSlack?: number
}

const LIST_NUMBER_RX = /^\(?\d{1,2}[.)]\s*/
// Heading decoration; a trailing period is handled apart since it can end a sentence
const TRAILING_MARKS_RX = /[\s:\-–—?!]+$/
const TRAILING_PUNCT_RX = /[\s:.\-–—?!]+$/
const SENTENCE_PUNCT_RX = /[.!?;:]/

function stripListNumber(line: string): string {
  return line.trim().replace(LIST_NUMBER_RX, '').toLowerCase()
}

/** Line reduced to the text a heading test looks at */
export function headingCandidate(line: string): string {
  return stripListNumber(line).replace(TRAILING_PUNCT_RX, '')
}

/** Ends in a period once colons, dashes and question marks are dropped */
export function endsAsSentence(line: string): boolean {
  return stripListNumber(line).replace(TRAILING_MARKS_RX, '').endsWith('.')
}

export function wordCount(value: string): number {
  return value.split(/\s+/).filter(Boolean).length
}

function startsWithWord(candidate: string, opening: string): boolean {
  if (!opening || !candidate.startsWith(opening)) return false
  const next = candidate.charAt(opening.length)
  return next === '' || !/[a-z0-9]/.test(next)
}

/**
 * Tolerant heading test. A line ending in a period is a heading only when it
 * is exactly the label or a prefix; otherwise it may carry a few extra words
 * with no sentence punctuation after the opening.
 */
export function headingMatcher({ label, prefixes, labelSlack = 2, prefixSlack = 3 }: HeadingMatcherOptions) {
  const openings = [
    { text: headingCandidate(label), slack: labelSlack },
    ...prefixes.map((prefix) => ({ text: headingCandidate(prefix), slack: prefixSlack })),
  ]
  return (line: string): boolean => {
    const candidate = headingCandidate(line)
    if (!candidate) return false
    if (endsAsSentence(line)) return openings.some(({ text }) => candidate === text)
    const words = wordCount(candidate)
    return openings.some(({ text, slack }) => {
      if (!startsWithWord(candidate, text)) return false
      if (SENTENCE_PUNCT_RX.test(candidate.slice(text.length))) return false
      return words <= wordCount(text) + slack
    })
  }
}

function spec(key: string, label: string, prefixes: string[]): HeadingSpec {
  return { key, label, matches: headingMatcher({ label, prefixes }) }
}

export const CLOSING_KEY = 'closing'
export const CLOSING_LABEL = 'Closing Call-to-Action'

export const closingHeading = (): HeadingSpec => spec(CLOSING_KEY, CLOSING_LABEL, ['closing'])

export function providerDisplayName(name?: string | null): string {
  const trimmed = (name ?? '').trim()
  return trimmed || 'Provider'
}

/** Executive summary headings, in the order the prompt asks for them */
export function executiveSummaryHeadings(providerName?: string | null): HeadingVocabulary {
  const provider = providerDisplayName(providerName)
  return [
    spec('introduction', 'Introduction', []),
    spec('understanding', 'Our Understanding of Your Goals', ['our understanding']),
    spec('approach', 'Our Approach to Meeting Your Goals', ['our approach']),
    spec('solution', 'Solution Overview', []),
    spec('delivery', 'How We Will Deliver', []),
    spec('why', `Why ${provider}`, ['why us', 'why choose']),
    closingHeading(),
  ]
}

/** Value Selling Points appendix headings */
export function valueSellingPointHeadings(providerName?: string | null): HeadingVocabulary {
  const provider = providerDisplayName(providerName)
  return [
    spec('case-for-change', 'Case for Change', []),
    spec('business-value', 'Business Value for the Client', ['business value']),
    spec('proposed-solution', `${provider} Proposed Solution`, ['proposed solution']),
  ]
}
