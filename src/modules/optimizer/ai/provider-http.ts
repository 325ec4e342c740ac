import type { ZodType } from 'zod'
import {
  ProviderConnectionError,
  ProviderHttpError,
  ProviderResponseError,
  ProviderTimeoutError,
  errorMessage
} from '../../../errors'

export interface PostJsonOptions {
  headers?: Record<string, string>
  timeoutMs: number
}

/**
 * POST a JSON payload to a provider endpoint and validate the JSON reply.
 * Failures surface as the provider error types so callers can classify them.
 */
export async function postJson<T>(
  provider: string,
  url: string,
  payload: unknown,
  schema: ZodType<T>,
  options: PostJsonOptions
): Promise<T> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs)

  let response: Response
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers
      },
      body: JSON.stringify(payload),
      signal: controller.signal
    })
  } catch (err) {
    clearTimeout(timeout)
    if (err instanceof DOMException && err.name === 'AbortError') {
      throw new ProviderTimeoutError(provider, options.timeoutMs)
    }
    throw new ProviderConnectionError(provider, errorMessage(err), { cause: err })
  }

  try {
    if (!response.ok) {
      const body = await response.text().catch(() => '')
      throw new ProviderHttpError(provider, response.status, body)
    }

    let data: unknown
    try {
      data = await response.json()
    } catch (err) {
      if (err instanceof DOMException && err.name === 'AbortError') {
        throw new ProviderTimeoutError(provider, options.timeoutMs)
      }
      throw new ProviderResponseError(provider, `invalid JSON (${errorMessage(err)})`)
    }

    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new ProviderResponseError(provider, `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    }
    return parsed.data
  } finally {
    clearTimeout(timeout)
  }
}
