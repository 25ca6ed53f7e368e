import { describe, it, expect } from 'vitest'
import { classify } from '../classify.js'
import { CLOSING_KEY, executiveSummaryHeadings } from '../headings.js'
import { buildClosingCallToAction, isClosingFragment, spliceClosing } from '../splice.js'
import { paragraph, bullet, type NarrativeDocument } from '../types.js'

const vocabulary = executiveSummaryHeadings('Northwind')
const cta = [paragraph('Canonical call to action.')]

const closingSections = (doc: NarrativeDocument) => doc.sections.filter((s) => s.key === CLOSING_KEY)

describe('spliceClosing', () => {
  it('collapses repeated malformed closings into one canonical section', () => {
    const text = 'Introduction\nHello\nClosing Call-to-Action\nOld text\nClosing Call-to-Action\nOld text'
    for (const duplicates of ['merge', 'keep-both', 'last-wins'] as const) {
      const spliced = spliceClosing(classify(text, vocabulary, { duplicates }), cta)
      expect(closingSections(spliced)).toEqual([
        { key: 'closing', label: 'Closing Call-to-Action', blocks: [paragraph('Canonical call to action.')] },
      ])
      expect(spliced.sections.map((s) => s.key)).toEqual(['introduction', 'closing'])
    }
  })

  it('cuts closing fragments left as content in the last section', () => {
    const doc = classify(
      'Why Northwind\n- Certified teams\n7) Closing: we look forward to working together.\nMore closing prose',
      vocabulary
    )
    const spliced = spliceClosing(doc, cta)
    expect(spliced.sections).toEqual([
      { key: 'why', label: 'Why Northwind', blocks: [bullet('Certified teams')] },
      { key: 'closing', label: 'Closing Call-to-Action', blocks: cta },
    ])
  })

  it('keeps bullets and sentences that merely start with "Closing"', () => {
    const doc = classify(
      [
        'Why Northwind',
        '- Closing the compliance gap with audit-ready reporting',
        '- ISO 27001 certified',
        'Closing the gap early is our focus.',
        'Closing Call-to-Action',
        'Let us talk.',
      ].join('\n'),
      vocabulary
    )
    expect(spliceClosing(doc, cta).sections).toEqual([
      {
        key: 'why',
        label: 'Why Northwind',
        blocks: [
          bullet('Closing the compliance gap with audit-ready reporting'),
          bullet('ISO 27001 certified'),
          paragraph('Closing the gap early is our focus.'),
        ],
      },
      { key: 'closing', label: 'Closing Call-to-Action', blocks: cta },
    ])
  })

  it('recognises numbered, labelled and heading-shaped closing paragraphs', () => {
    expect(isClosingFragment(paragraph('7) Closing remarks follow'))).toBe(true)
    expect(isClosingFragment(paragraph('Closing: let us meet'))).toBe(true)
    expect(isClosingFragment(paragraph('Closing Call-to-Action.'))).toBe(true)
    expect(isClosingFragment(bullet('Closing: let us meet'))).toBe(false)
    expect(isClosingFragment(paragraph('Closing the loop on audits.'))).toBe(false)
  })

  it('cuts closing fragments from the preamble when no section remains', () => {
    const doc: NarrativeDocument = {
      preamble: [paragraph('Intro text'), paragraph('Closing: remarks from the model'), paragraph('Bye')],
      sections: [],
    }
    const spliced = spliceClosing(doc, cta)
    expect(spliced.preamble).toEqual([paragraph('Intro text')])
    expect(spliced.sections.map((s) => s.key)).toEqual(['closing'])
  })

  it('is idempotent', () => {
    const docs = [
      classify('Introduction\nHello\nClosing Call-to-Action\nOld', vocabulary),
      classify('Solution Overview\n- A\n7) Closing fragment that ran on', vocabulary),
      classify('No headings at all\nClosing line', vocabulary),
      { preamble: [], sections: [] },
    ]
    for (const doc of docs) {
      const once = spliceClosing(doc, cta)
      expect(spliceClosing(once, cta)).toEqual(once)
    }
  })

  it('does not modify its input', () => {
    const doc = classify('Introduction\nHello\nClosing Call-to-Action\nOld', vocabulary)
    const before = JSON.parse(JSON.stringify(doc))
    spliceClosing(doc, cta)
    expect(doc).toEqual(before)
  })

  it('honours a custom closing heading', () => {
    const spliced = spliceClosing({ preamble: [], sections: [] }, cta, { key: 'next-steps', label: 'Next Steps' })
    expect(spliced.sections[0]).toMatchObject({ key: 'next-steps', label: 'Next Steps' })
  })
})

describe('buildClosingCallToAction', () => {
  it('names the provider and the client', () => {
    const [block] = buildClosingCallToAction({ providerName: 'Northwind', clientName: 'Harbor Clinics' })
    expect(block?.kind).toBe('paragraph')
    expect(block?.text.startsWith('Northwind recommends moving forward with a phased engagement')).toBe(true)
    expect(block?.text).toContain('to ensure Harbor Clinics achieves sustainable improvements')
  })

  it('falls back when names are missing', () => {
    const [block] = buildClosingCallToAction({ providerName: ' ', clientName: null })
    expect(block?.text.startsWith('Provider recommends')).toBe(true)
    expect(block?.text).toContain('to ensure the client achieves')
  })
})
