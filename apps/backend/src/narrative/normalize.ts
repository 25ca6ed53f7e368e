// apps/backend/src/narrative/normalize.ts

const EMPHASIS_RX: Array<[RegExp, string]> = [
  [/\*\*(?=\S)([^\n]+?)\*\*/g, '$1'],
  [/__(?=\S)([^\n]+?)__/g, '$1'],
  [/\*(?=\S)([^*\n]+?)\*/g, '$1'],
]

const HEADING_MARKER_RX = /^[ \t]*(?:#+[ \t]*)+/gm

// Markdown list markers plus the glyphs models like to emit for bullets
const BULLET_RX = /^[ \t]*(?:[•◦▪▫●○■□‣⁃∙·►▸➤➢✓✔]|[*+](?=[ \t]))[ \t]*/gm

function stripEmphasis(text: string): string {
  let out = text
  let changed = true
  while (changed) {
    changed = false
    for (const [rx, rep] of EMPHASIS_RX) {
      const next = out.replace(rx, rep)
      if (next !== out) {
        out = next
        changed = true
      }
    }
  }
  return out
}

/**
 * Cleans raw model output into plain text the classifier can read.
 * Pure and idempotent.
 */
export function normalize(raw: string): string {
  if (!raw) return ''
  let text = String(raw).replace(/\r\n?/g, '\n')
  text = stripEmphasis(text)
  text = text.replace(HEADING_MARKER_RX, '')
  text = text.replace(BULLET_RX, '- ')
  text = text.replace(/[ \t]+$/gm, '')
  text = text.replace(/\n{3,}/g, '\n\n')
  return text.trim()
}
