/**
 * Resume document model
 *
 * A resume source is a markdown file read line by line. Each line becomes one
 * block; renderers (DOX, DOCX, PDF) walk the same block list so every output
 * mirrors the structure of the source.
 */

/** Heading depth: `#` through `####` */
export type HeadingLevel = 1 | 2 | 3 | 4

interface BlockBase {
  /** Source line with trailing whitespace removed */
  raw: string
  /** 1-based line number in the source */
  line: number
}

export interface HeadingBlock extends BlockBase {
  kind: "heading"
  level: HeadingLevel
  text: string
}

export interface BulletBlock extends BlockBase {
  kind: "bullet"
  /** Nesting depth, 0 for top-level bullets (two spaces per level) */
  depth: number
  text: string
}

export interface ParagraphBlock extends BlockBase {
  kind: "paragraph"
  text: string
}

/** A whole line wrapped in single emphasis markers, e.g. `*Remote · 2021 - 2024*` */
export interface EmphasisBlock extends BlockBase {
  kind: "emphasis"
  text: string
}

export interface BlankBlock extends BlockBase {
  kind: "blank"
}

export type ResumeBlock = HeadingBlock | BulletBlock | ParagraphBlock | EmphasisBlock | BlankBlock

export type ResumeBlockKind = ResumeBlock["kind"]

/** A run of inline text with uniform formatting */
export interface InlineSegment {
  text: string
  bold: boolean
  italics: boolean
}
