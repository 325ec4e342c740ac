import {
  Document,
  Packer,
  Paragraph,
  TextRun,
  HeadingLevel,
  convertInchesToTwip,
  type IRunOptions
} from 'docx'
import type { Logger } from 'pino'
import type { HeadingLevel as MarkdownHeadingLevel, InlineSegment, ResumeBlock } from '@shared/types'
import { parseInline } from '../document/markdown.parser'
import { logger as rootLogger } from '../../logger'

const FONT = 'Calibri'
const FONT_SIZE_BODY = 22 // half-points (11pt)
const MAX_BULLET_LEVEL = 8

export type DocxParagraphStyle = 'Title' | 'Heading1' | 'Heading2' | 'Heading3' | 'ListBullet' | 'Normal'

/** Renderer-neutral description of one Word paragraph */
export interface DocxParagraphSpec {
  style: DocxParagraphStyle
  runs: InlineSegment[]
  /** Bullet nesting level, only for ListBullet */
  level?: number
}

const HEADING_STYLES: Record<MarkdownHeadingLevel, DocxParagraphStyle> = {
  1: 'Title',
  2: 'Heading1',
  3: 'Heading2',
  4: 'Heading3'
}

const DOCX_HEADINGS = {
  Title: HeadingLevel.TITLE,
  Heading1: HeadingLevel.HEADING_1,
  Heading2: HeadingLevel.HEADING_2,
  Heading3: HeadingLevel.HEADING_3
} as const

/**
 * One paragraph per non-blank block. `#` is the document title and
 * `##`-`####` are Heading 1-3, matching Word's built-in outline.
 */
export function buildDocxParagraphSpecs(blocks: ResumeBlock[]): DocxParagraphSpec[] {
  const specs: DocxParagraphSpec[] = []
  for (const block of blocks) {
    switch (block.kind) {
      case 'blank':
        break
      case 'heading':
        specs.push({ style: HEADING_STYLES[block.level], runs: parseInline(block.text) })
        break
      case 'bullet':
        specs.push({
          style: 'ListBullet',
          runs: parseInline(block.text),
          level: Math.min(block.depth, MAX_BULLET_LEVEL)
        })
        break
      case 'emphasis':
        specs.push({
          style: 'Normal',
          runs: parseInline(block.text).map((run) => ({ ...run, italics: true }))
        })
        break
      case 'paragraph':
        specs.push({ style: 'Normal', runs: parseInline(block.text) })
        break
    }
  }
  return specs
}

function textRuns(runs: InlineSegment[], opts?: Partial<IRunOptions>): TextRun[] {
  return runs.map(
    (run) =>
      new TextRun({
        text: run.text,
        bold: run.bold || undefined,
        italics: run.italics || undefined,
        font: FONT,
        ...opts
      })
  )
}

function toParagraph(spec: DocxParagraphSpec): Paragraph {
  switch (spec.style) {
    case 'Title':
    case 'Heading1':
    case 'Heading2':
    case 'Heading3':
      return new Paragraph({
        children: textRuns(spec.runs),
        heading: DOCX_HEADINGS[spec.style],
        spacing: { before: spec.style === 'Title' ? 0 : 160, after: 60 }
      })
    case 'ListBullet':
      return new Paragraph({
        children: textRuns(spec.runs, { size: FONT_SIZE_BODY }),
        bullet: { level: spec.level ?? 0 },
        spacing: { after: 20 }
      })
    case 'Normal':
      return new Paragraph({
        children: textRuns(spec.runs, { size: FONT_SIZE_BODY }),
        spacing: { after: 60 }
      })
  }
}

export class DocxService {
  constructor(private readonly log: Logger = rootLogger) {}

  async renderResume(blocks: ResumeBlock[], options: { title?: string } = {}): Promise<Buffer> {
    const specs = buildDocxParagraphSpecs(blocks)

    const doc = new Document({
      creator: '',
      title: options.title ?? 'Resume',
      sections: [
        {
          properties: {
            page: {
              margin: {
                top: convertInchesToTwip(0.75),
                bottom: convertInchesToTwip(0.75),
                left: convertInchesToTwip(1),
                right: convertInchesToTwip(1)
              }
            }
          },
          children: specs.map(toParagraph)
        }
      ]
    })

    const buffer = await Packer.toBuffer(doc)
    this.log.debug({ paragraphs: specs.length, size: buffer.length }, 'DOCX rendered')
    return Buffer.from(buffer)
  }
}
