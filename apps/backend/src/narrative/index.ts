export * from './types.js'
export { normalize } from './normalize.js'
export {
  CLOSING_KEY,
  CLOSING_LABEL,
  closingHeading,
  executiveSummaryHeadings,
  headingMatcher,
  providerDisplayName,
  valueSellingPointHeadings,
} from './headings.js'
export { classify, DEFAULT_DUPLICATE_POLICY } from './classify.js'
export type { ClassifyOptions } from './classify.js'
export { spliceClosing, buildClosingCallToAction, isClosingFragment } from './splice.js'
export type { SpliceOptions, CallToActionInput } from './splice.js'
export { serializeDocument } from './plain-text.js'
