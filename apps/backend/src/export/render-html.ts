import type { BlockStyle, RenderedOutput } from './types.js'
import { escapeHtml } from './utils.js'

function styleAttr(style: BlockStyle): string {
  const rules = [
    style.alignment ? `text-align:${style.alignment === 'justify' ? 'justify' : 'left'}` : '',
    style.bold ? 'font-weight:bold' : '',
    style.sizePt ? `font-size:${style.sizePt}pt` : '',
    `margin-bottom:${style.spaceAfterPt}pt`,
  ].filter(Boolean)
  return ` style="${rules.join(';')}"`
}

/** In-app view of a rendered summary. Breaks become rules, bullets are grouped into lists. */
export function renderHtml(output: RenderedOutput): string {
  const out: string[] = []
  let inUL = false

  const closeList = () => {
    if (inUL) out.push('</ul>')
    inUL = false
  }

  for (const block of output.blocks) {
    if (block.kind === 'bullet') {
      if (!inUL) {
        out.push('<ul>')
        inUL = true
      }
      out.push(`<li${styleAttr(block.style)}>${escapeHtml(block.text)}</li>`)
      continue
    }

    closeList()
    switch (block.kind) {
      case 'title':
        out.push(`<h1>${escapeHtml(block.text)}</h1>`)
        break
      case 'subheading':
        out.push(`<h2>${escapeHtml(block.text)}</h2>`)
        break
      case 'heading':
        out.push(`<h3 data-section="${escapeHtml(block.key)}"${styleAttr(block.style)}>${escapeHtml(block.text)}</h3>`)
        break
      case 'paragraph':
        out.push(`<p${styleAttr(block.style)}>${escapeHtml(block.text)}</p>`)
        break
      case 'break':
        out.push('<hr class="page-break"/>')
        break
    }
  }
  closeList()

  return out.join('') || '<p class="empty"><em>No content provided.</em></p>'
}
