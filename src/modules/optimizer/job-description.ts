import { logger } from '../../logger'
import { env } from '../../config/env'
import { JobFetchError, errorMessage } from '../../errors'

export const JOB_DESCRIPTION_MAX_CHARS = 10_000

const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36'

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X' ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10)
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match
    }
    return ENTITIES[entity.toLowerCase()] ?? match
  })
}

/**
 * Reduce a job posting page to plain text: scripts and styles dropped, tags
 * replaced by spaces, whitespace collapsed.
 */
export function htmlToText(html: string): string {
  let content = html
  content = content.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
  content = content.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
  content = content.replace(/<[^>]+>/g, ' ')
  content = decodeEntities(content)
  return content.replace(/\s+/g, ' ').trim()
}

export interface FetchJobDescriptionOptions {
  timeoutMs?: number
}

export async function fetchJobDescription(url: string, options: FetchJobDescriptionOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? env.JOB_FETCH_TIMEOUT_MS
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: controller.signal
    })

    if (!response.ok) {
      throw new JobFetchError(url, `HTTP ${response.status} ${response.statusText}`.trim())
    }

    const text = htmlToText(await response.text()).slice(0, JOB_DESCRIPTION_MAX_CHARS)
    logger.debug({ url, chars: text.length }, 'Fetched job description')
    return text
  } catch (err) {
    if (err instanceof JobFetchError) {
      throw err
    }
    if (err instanceof DOMException && err.name === 'AbortError') {
      throw new JobFetchError(url, `timed out after ${timeoutMs / 1000} seconds`, { cause: err })
    }
    throw new JobFetchError(url, errorMessage(err), { cause: err })
  } finally {
    clearTimeout(timeout)
  }
}
