/**
 * Error types raised by the build, optimizer and promotion modules.
 * Command entry points print `message` and exit non-zero.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

export class SourceNotFoundError extends Error {
  constructor(
    readonly kind: string,
    readonly filePath: string
  ) {
    super(`${kind} not found: ${filePath}`)
    this.name = 'SourceNotFoundError'
  }
}

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProviderConfigError'
  }
}

export class ProviderHttpError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${provider} request failed (HTTP ${status}): ${body.slice(0, 300)}`)
    this.name = 'ProviderHttpError'
  }
}

export class ProviderConnectionError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${provider} connection failed: ${message}`, options)
    this.name = 'ProviderConnectionError'
  }
}

export class ProviderTimeoutError extends Error {
  constructor(
    readonly provider: string,
    readonly timeoutMs: number
  ) {
    super(`${provider} request timed out after ${timeoutMs / 1000} seconds`)
    this.name = 'ProviderTimeoutError'
  }
}

export class ProviderResponseError extends Error {
  constructor(
    readonly provider: string,
    message: string
  ) {
    super(`${provider} returned an unexpected response: ${message}`)
    this.name = 'ProviderResponseError'
  }
}

export class JobFetchError extends Error {
  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch job description from ${url}: ${reason}`, options)
    this.name = 'JobFetchError'
  }
}

export class OptimizationResponseError extends Error {
  constructor(
    message: string,
    readonly debugFile: string
  ) {
    super(message)
    this.name = 'OptimizationResponseError'
  }
}

export type DoxygenFailureReason = 'not_found' | 'failed'

export class DoxygenError extends Error {
  constructor(
    readonly reason: DoxygenFailureReason,
    message: string
  ) {
    super(message)
    this.name = 'DoxygenError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
