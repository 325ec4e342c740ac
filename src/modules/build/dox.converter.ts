import type { ResumeBlock } from '@shared/types'
import { parseResumeMarkdown } from '../document/markdown.parser'
import { escapeHtml, slugify } from '../document/text.util'

const SECTION_COMMANDS = {
  2: '@section',
  3: '@subsection',
  4: '@subsubsection'
} as const

const PARAGRAPH_ID_CHARS = 30

/** Hands out Doxygen labels, suffixing repeats so every anchor stays unique */
class LabelRegistry {
  private readonly seen = new Map<string, number>()

  take(base: string): string {
    const label = base || 'section'
    const count = (this.seen.get(label) ?? 0) + 1
    this.seen.set(label, count)
    return count === 1 ? label : `${label}_${count}`
  }
}

function nextContentIndex(blocks: ResumeBlock[], from: number): number {
  let index = from
  while (index < blocks.length && blocks[index].kind === 'blank') index++
  return index
}

/**
 * Convert a resume markdown source into a Doxygen page.
 *
 * The first `#` heading becomes an HTML header with the contact line that
 * follows it; `##`-`####` headings become section commands; whole-line
 * emphasis becomes a `@paragraph`. Bullets and paragraphs pass through.
 */
export function convertMarkdownToDox(markdown: string): string {
  const blocks = parseResumeMarkdown(markdown)
  const labels = new LabelRegistry()
  const title = blocks.find((b) => b.kind === 'heading' && b.level === 1)
  const pageTitle = title && title.kind === 'heading' ? `${title.text} — Resume` : 'Resume'

  const output: string[] = ['/*!', `@page resume ${pageTitle}`, '']
  let headerDone = false

  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i]

    switch (block.kind) {
      case 'heading': {
        if (block.level === 1) {
          if (headerDone) {
            output.push(block.raw)
            break
          }
          headerDone = true
          const name = escapeHtml(block.text)
          const next = nextContentIndex(blocks, i + 1)
          const contact = blocks[next]
          output.push('@htmlonly')
          if (contact && contact.kind !== 'heading') {
            output.push(`<p><strong>${name}</strong><br/>`)
            output.push(`${escapeHtml(contact.raw.trim())}</p>`)
            i = next
          } else {
            output.push(`<p><strong>${name}</strong></p>`)
          }
          output.push('@endhtmlonly', '')
          break
        }
        const command = SECTION_COMMANDS[block.level]
        output.push(`${command} ${labels.take(slugify(block.text))} ${block.text}`, '')
        break
      }
      case 'emphasis': {
        const id = labels.take(slugify(block.text.toLowerCase().slice(0, PARAGRAPH_ID_CHARS)))
        output.push(`@paragraph ${id}`, block.text, '')
        break
      }
      case 'blank':
        output.push('')
        break
      case 'bullet':
      case 'paragraph':
        output.push(block.raw)
        break
    }
  }

  output.push('*/')
  return output.join('\n')
}
