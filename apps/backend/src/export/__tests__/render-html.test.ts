import { describe, it, expect } from 'vitest'
import { renderHtml } from '../render-html.js'
import { SUMMARY_PROFILE } from '../walk.js'

describe('renderHtml', () => {
  it('renders headings, escaped paragraphs, grouped bullets and breaks', () => {
    const html = renderHtml({
      title: 'T',
      blocks: [
        { kind: 'title', text: 'Summary <draft>' },
        { kind: 'heading', key: 'intro', text: 'Intro', style: SUMMARY_PROFILE.heading },
        { kind: 'paragraph', text: 'A & B', style: SUMMARY_PROFILE.paragraph },
        { kind: 'bullet', text: 'x', style: SUMMARY_PROFILE.bullet },
        { kind: 'bullet', text: 'y', style: SUMMARY_PROFILE.bullet },
        { kind: 'break' },
        { kind: 'subheading', text: 'Contact Information' },
      ],
    })
    expect(html).toBe(
      '<h1>Summary &lt;draft&gt;</h1>' +
        '<h3 data-section="intro" style="text-align:left;font-weight:bold;font-size:14pt;margin-bottom:10pt">Intro</h3>' +
        '<p style="text-align:justify;margin-bottom:8pt">A &amp; B</p>' +
        '<ul><li style="margin-bottom:4pt">x</li><li style="margin-bottom:4pt">y</li></ul>' +
        '<hr class="page-break"/>' +
        '<h2>Contact Information</h2>'
    )
  })

  it('closes a trailing list', () => {
    const html = renderHtml({ title: 'T', blocks: [{ kind: 'bullet', text: 'only', style: { spaceAfterPt: 4 } }] })
    expect(html).toBe('<ul><li style="margin-bottom:4pt">only</li></ul>')
  })

  it('shows a placeholder for empty output', () => {
    expect(renderHtml({ title: 'T', blocks: [] })).toBe('<p class="empty"><em>No content provided.</em></p>')
  })
})
