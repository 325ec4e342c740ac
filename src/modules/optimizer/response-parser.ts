import path from 'node:path'
import {
  OPTIMIZATION_RESPONSE_FIELDS,
  optimizationResponseSchema,
  type OptimizationResponse
} from '@shared/types'
import { logger } from '../../logger'
import { OptimizationResponseError, errorMessage } from '../../errors'
import { formatTimestamp } from '../../utils/timestamp'
import { writeFileEnsuringDir } from '../../utils/fs.util'

/**
 * Find the JSON object in a model reply: a fenced ```json block first, then
 * the first balanced `{...}`. Braces inside JSON strings are ignored.
 */
export function extractJsonFromText(text: string): string | null {
  const codeBlockMatch = text.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/)
  if (codeBlockMatch) {
    return codeBlockMatch[1]
  }

  const firstBrace = text.indexOf('{')
  if (firstBrace === -1) {
    return null
  }

  let depth = 0
  let inString = false
  let escaped = false
  for (let i = firstBrace; i < text.length; i++) {
    const ch = text[i]
    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === '"') {
      inString = true
    } else if (ch === '{') {
      depth++
    } else if (ch === '}') {
      depth--
      if (depth === 0) {
        return text.slice(firstBrace, i + 1)
      }
    }
  }
  return null
}

export interface ParseResponseOptions {
  /** Where debug dumps of unusable replies are written */
  debugDir: string
  now?: () => Date
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse the optimizer reply into its three fields. An unusable reply is
 * written to `ai_response_debug_<timestamp>.txt` and reported with that path.
 */
export async function parseOptimizationResponse(
  content: string,
  options: ParseResponseOptions
): Promise<OptimizationResponse> {
  const now = options.now ?? (() => new Date())
  const writeDebug = async (body: string) => {
    const file = path.join(options.debugDir, `ai_response_debug_${formatTimestamp(now())}.txt`)
    await writeFileEnsuringDir(file, body)
    logger.warn({ debugFile: file, chars: content.length }, 'Saved unusable AI response')
    return file
  }

  const jsonStr = extractJsonFromText(content)
  if (jsonStr === null) {
    const file = await writeDebug(content)
    throw new OptimizationResponseError(
      `Could not extract JSON from AI response. Raw response saved to ${file} for debugging.`,
      file
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(jsonStr)
  } catch (err) {
    const reason = errorMessage(err)
    const file = await writeDebug(`JSON Parse Error: ${reason}\n\nExtracted JSON:\n${jsonStr}\n\nFull Response:\n${content}`)
    throw new OptimizationResponseError(`Failed to parse JSON from AI response: ${reason}. Debug info saved to ${file}`, file)
  }

  const record = isRecord(parsed) ? parsed : {}
  const missing = OPTIMIZATION_RESPONSE_FIELDS.filter((field) => !(field in record))
  if (missing.length > 0) {
    const file = await writeDebug(content)
    throw new OptimizationResponseError(
      `Missing required fields in AI response: ${missing.join(', ')}. Debug info saved to ${file}`,
      file
    )
  }

  const result = optimizationResponseSchema.safeParse(record)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    const file = await writeDebug(content)
    throw new OptimizationResponseError(`Invalid AI response: ${issues}. Debug info saved to ${file}`, file)
  }
  return result.data
}
