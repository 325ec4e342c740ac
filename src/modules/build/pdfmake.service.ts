import PdfPrinter from 'pdfmake'
import type { Content, ContentText, StyleDictionary, TDocumentDefinitions } from 'pdfmake/interfaces'
import type { Logger } from 'pino'
import type { InlineSegment, ResumeBlock } from '@shared/types'
import { parseInline } from '../document/markdown.parser'
import { logger as rootLogger } from '../../logger'

const INCH = 72
const PAGE_MARGIN = 0.75 * INCH

const H1 = 16
const H2 = 12
const H3 = 11
const BODY = 10
const LEADING = 13

const BLANK_LINE_GAP = 6
const BULLET_INDENT = 12

// Use standard fonts that pdfmake bundles
const fonts = {
  Helvetica: {
    normal: 'Helvetica',
    bold: 'Helvetica-Bold',
    italics: 'Helvetica-Oblique',
    bolditalics: 'Helvetica-BoldOblique'
  }
}

const printer = new PdfPrinter(fonts)

const styles: StyleDictionary = {
  h1: { fontSize: H1, bold: true, lineHeight: LEADING / H1, margin: [0, 0, 0, 4] },
  h2: { fontSize: H2, bold: true, lineHeight: LEADING / H2, margin: [0, 0, 0, 2] },
  h3: { fontSize: H3, bold: true, lineHeight: LEADING / H3 },
  body: { fontSize: BODY, lineHeight: LEADING / BODY }
}

const HEADING_STYLE = { 1: 'h1', 2: 'h2', 3: 'h3', 4: 'h3' } as const

function inlineText(runs: InlineSegment[]): ContentText['text'] {
  return runs.map((run) => ({ text: run.text, bold: run.bold, italics: run.italics }))
}

/**
 * Lay out resume blocks on a LETTER page: bold headings, `•` bullets
 * indented per depth, body text in Helvetica 10pt. Blank lines add a small
 * gap before the next block; pdfmake handles wrapping and page breaks.
 */
export function buildResumePdfDefinition(blocks: ResumeBlock[], options: { title?: string } = {}): TDocumentDefinitions {
  const content: Content[] = []
  let pendingGap = 0

  for (const block of blocks) {
    if (block.kind === 'blank') {
      pendingGap += BLANK_LINE_GAP
      continue
    }
    const top = pendingGap
    pendingGap = 0

    switch (block.kind) {
      case 'heading': {
        const style = HEADING_STYLE[block.level]
        const after = style === 'h1' ? 4 : style === 'h2' ? 2 : 0
        content.push({ text: inlineText(parseInline(block.text)), style, margin: [0, top, 0, after] })
        break
      }
      case 'bullet': {
        const indent = block.depth * BULLET_INDENT
        content.push({
          columns: [
            { text: '•', width: BULLET_INDENT, style: 'body' },
            { text: inlineText(parseInline(block.text)), width: '*', style: 'body' }
          ],
          columnGap: 0,
          margin: [indent, top, 0, 0]
        })
        break
      }
      case 'emphasis':
        content.push({
          text: inlineText(parseInline(block.text).map((run) => ({ ...run, italics: true }))),
          style: 'body',
          margin: [0, top, 0, 0]
        })
        break
      case 'paragraph':
        content.push({ text: inlineText(parseInline(block.text)), style: 'body', margin: [0, top, 0, 0] })
        break
    }
  }

  return {
    pageSize: 'LETTER',
    pageMargins: [PAGE_MARGIN, PAGE_MARGIN, PAGE_MARGIN, PAGE_MARGIN],
    info: { title: options.title ?? 'Resume' },
    defaultStyle: { font: 'Helvetica', fontSize: BODY },
    styles,
    content
  }
}

export class PdfMakeService {
  constructor(private readonly log: Logger = rootLogger) {}

  renderResume(blocks: ResumeBlock[], options: { title?: string } = {}): Promise<Buffer> {
    return this.generatePdfBuffer(buildResumePdfDefinition(blocks, options))
  }

  private generatePdfBuffer(docDefinition: TDocumentDefinitions): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const handleError = (error: unknown) => {
        this.log.error({ err: error }, 'pdfmake PDF generation failed')
        const message = error instanceof Error ? error.message : 'Unknown error'
        reject(new Error(`PDF generation failed: ${message}`))
      }

      try {
        const pdfDoc = printer.createPdfKitDocument(docDefinition)
        const chunks: Buffer[] = []

        pdfDoc.on('data', (chunk: Buffer) => {
          chunks.push(chunk)
        })

        pdfDoc.on('end', () => {
          const result = Buffer.concat(chunks)
          this.log.debug({ size: result.length }, 'PDF rendered')
          resolve(result)
        })

        pdfDoc.on('error', handleError)

        pdfDoc.end()
      } catch (error) {
        handleError(error)
      }
    })
  }
}
