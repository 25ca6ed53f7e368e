import { describe, it, expect } from 'vitest'
import { classify } from '../classify.js'
import { executiveSummaryHeadings } from '../headings.js'
import { serializeDocument } from '../plain-text.js'
import { bullet, paragraph, type NarrativeDocument } from '../types.js'

const vocabulary = executiveSummaryHeadings('Northwind')

const doc: NarrativeDocument = {
  preamble: [paragraph('Prepared for Harbor Clinics')],
  sections: [
    { key: 'introduction', label: 'Introduction', blocks: [paragraph('We are pleased to present this summary.')] },
    {
      key: 'solution',
      label: 'Solution Overview',
      blocks: [bullet('Scheduling module cuts wait times'), bullet('Billing automation lifts margins')],
    },
    { key: 'why', label: 'Why Northwind', blocks: [paragraph('Ten years in regional healthcare.'), bullet('ISO 27001')] },
  ],
}

describe('serializeDocument', () => {
  it('writes headings, bullets and paragraphs as plain lines', () => {
    expect(serializeDocument(doc)).toBe(
      [
        'Prepared for Harbor Clinics',
        '',
        'Introduction',
        'We are pleased to present this summary.',
        '',
        'Solution Overview',
        '- Scheduling module cuts wait times',
        '- Billing automation lifts margins',
        '',
        'Why Northwind',
        'Ten years in regional healthcare.',
        '- ISO 27001',
      ].join('\n')
    )
  })

  it('round-trips through classify', () => {
    expect(classify(serializeDocument(doc), vocabulary)).toEqual(doc)
  })

  it('serializes an empty document to an empty string', () => {
    expect(serializeDocument({ preamble: [], sections: [] })).toBe('')
  })
})
