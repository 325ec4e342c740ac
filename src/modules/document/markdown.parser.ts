import type { HeadingLevel, InlineSegment, ResumeBlock } from '@shared/types'
import { cleanText } from './text.util'

const HEADING_PREFIXES: ReadonlyArray<[string, HeadingLevel]> = [
  ['#### ', 4],
  ['### ', 3],
  ['## ', 2],
  ['# ', 1]
]

const BULLET = /^(\s*)[-*] (.*)$/
// A whole line in single `*` or `_` emphasis; `**bold**` lines stay paragraphs
const EMPHASIS_LINE = /^(?:\*(?!\*)(.+?)\*|_(?!_)(.+?)_)$/

function headingOf(line: string): { level: HeadingLevel; text: string } | null {
  for (const [prefix, level] of HEADING_PREFIXES) {
    if (line.startsWith(prefix)) {
      return { level, text: line.slice(prefix.length).trim() }
    }
  }
  return null
}

/**
 * Split a resume markdown source into one block per line.
 * Headings must start at column 0; bullets may be indented (two spaces per level).
 */
export function parseResumeMarkdown(source: string): ResumeBlock[] {
  const lines = source.replace(/\r\n?/g, '\n').split('\n')
  // A trailing newline does not add a blank block
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop()

  return lines.map((original, index): ResumeBlock => {
    const raw = original.trimEnd()
    const line = index + 1

    if (!raw.trim()) {
      return { kind: 'blank', raw: '', line }
    }

    const heading = headingOf(raw)
    if (heading) {
      return { kind: 'heading', level: heading.level, text: heading.text, raw, line }
    }

    const bullet = BULLET.exec(raw)
    if (bullet) {
      const indent = bullet[1].replace(/\t/g, '  ').length
      return { kind: 'bullet', depth: Math.floor(indent / 2), text: bullet[2].trim(), raw, line }
    }

    const trimmed = raw.trim()
    const emphasis = EMPHASIS_LINE.exec(trimmed)
    if (emphasis) {
      return { kind: 'emphasis', text: (emphasis[1] ?? emphasis[2]).trim(), raw, line }
    }

    return { kind: 'paragraph', text: trimmed, raw, line }
  })
}

const INLINE_TOKEN = new RegExp(
  [
    String.raw`\*\*\*(?=\S)(.+?)(?<=\S)\*\*\*`,
    String.raw`\*\*(?=\S)(.+?)(?<=\S)\*\*`,
    String.raw`(?<!\w)__(?=\S)(.+?)(?<=\S)__(?!\w)`,
    String.raw`\*(?=\S)(.+?)(?<=\S)\*`,
    // `snake_case` identifiers are not emphasis
    String.raw`(?<!\w)_(?=\S)(.+?)(?<=\S)_(?!\w)`
  ].join('|'),
  'g'
)

/**
 * Split inline markdown into formatted runs. Links collapse to their label.
 * Adjacent runs never share the same formatting.
 */
export function parseInline(text: string): InlineSegment[] {
  const cleaned = cleanText(text)
  const segments: InlineSegment[] = []

  const push = (value: string, bold: boolean, italics: boolean) => {
    if (!value) return
    const last = segments[segments.length - 1]
    if (last && last.bold === bold && last.italics === italics) {
      last.text += value
    } else {
      segments.push({ text: value, bold, italics })
    }
  }

  let cursor = 0
  for (const match of cleaned.matchAll(INLINE_TOKEN)) {
    const start = match.index ?? 0
    push(cleaned.slice(cursor, start), false, false)
    const [, both, strong, strongAlt, em, emAlt] = match
    if (both !== undefined) {
      push(both, true, true)
    } else if (strong !== undefined || strongAlt !== undefined) {
      push(strong ?? strongAlt ?? '', true, false)
    } else {
      push(em ?? emAlt ?? '', false, true)
    }
    cursor = start + match[0].length
  }
  push(cleaned.slice(cursor), false, false)

  return segments
}

/** Plain text of a line with inline markers removed */
export function plainText(text: string): string {
  return parseInline(text)
    .map((segment) => segment.text)
    .join('')
}
