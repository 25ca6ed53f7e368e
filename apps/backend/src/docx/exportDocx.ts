import { AlignmentType, Document, HeadingLevel, Packer, PageBreak, Paragraph, TextRun } from 'docx'
import type { BlockStyle, RenderedBlock, RenderedOutput } from '../export/types.js'

export const DOCX_FILE_NAME = 'Executive_Summary.docx'

// docx measures font size in half-points and spacing in twentieths of a point
const halfPoints = (pt: number) => pt * 2
const twips = (pt: number) => pt * 20

function alignment(style: BlockStyle) {
  if (style.alignment === 'justify') return AlignmentType.JUSTIFIED
  if (style.alignment === 'left') return AlignmentType.LEFT
  return undefined
}

function paragraphFromBlock(block: RenderedBlock): Paragraph {
  switch (block.kind) {
    case 'title':
      return new Paragraph({ heading: HeadingLevel.TITLE, children: [new TextRun(block.text)] })
    case 'subheading':
      return new Paragraph({ heading: HeadingLevel.HEADING_1, children: [new TextRun(block.text)] })
    case 'heading':
      return new Paragraph({
        alignment: alignment(block.style),
        spacing: { after: twips(block.style.spaceAfterPt) },
        children: [
          new TextRun({
            text: block.text,
            bold: block.style.bold,
            size: block.style.sizePt ? halfPoints(block.style.sizePt) : undefined,
          }),
        ],
      })
    case 'bullet':
      return new Paragraph({
        bullet: { level: 0 },
        spacing: { after: twips(block.style.spaceAfterPt) },
        children: [new TextRun(block.text)],
      })
    case 'paragraph':
      return new Paragraph({
        alignment: alignment(block.style),
        spacing: { after: twips(block.style.spaceAfterPt) },
        children: [new TextRun(block.text)],
      })
    case 'break':
      return new Paragraph({ children: [new PageBreak()] })
  }
}

export function docxParagraphs(output: RenderedOutput): Paragraph[] {
  return output.blocks.map(paragraphFromBlock)
}

export async function exportDocx(output: RenderedOutput): Promise<Buffer> {
  const doc = new Document({
    title: output.title,
    sections: [
      {
        properties: {},
        children: docxParagraphs(output),
      },
    ],
  })

  return Packer.toBuffer(doc)
}
