import {
  ProviderConfigError,
  ProviderConnectionError,
  ProviderHttpError,
  ProviderTimeoutError,
  errorMessage
} from '../../errors'

export type ProviderFailureType = 'config' | 'quota' | 'auth' | 'rate_limit' | 'connection' | 'other'

const AUTH_ERROR_KEYWORDS = [
  'invalid_api_key',
  'invalid api key',
  'incorrect api key',
  'api key not valid',
  'authentication',
  'unauthorized',
  'expired token',
  '401'
]

const QUOTA_ERROR_KEYWORDS = [
  'insufficient_quota',
  'quota exceeded',
  'quota_exceeded',
  'exceeded your current quota',
  'resource exhausted',
  'resource_exhausted',
  'billing'
]

const RATE_LIMIT_KEYWORDS = [
  'rate limit',
  'rate_limit',
  'ratelimit',
  'too many requests',
  'tokens per minute',
  'requests per minute',
  '429'
]

const CONNECTION_KEYWORDS = ['connection', 'timed out', 'timeout', 'econnrefused', 'enotfound', 'fetch failed']

function includesAny(message: string, keywords: string[]): boolean {
  const lowered = message.toLowerCase()
  return keywords.some((k) => lowered.includes(k))
}

export function isAuthenticationError(message?: string): boolean {
  return !!message && includesAny(message, AUTH_ERROR_KEYWORDS)
}

export function isQuotaError(message?: string): boolean {
  return !!message && includesAny(message, QUOTA_ERROR_KEYWORDS)
}

export function isRateLimitError(message?: string): boolean {
  return !!message && includesAny(message, RATE_LIMIT_KEYWORDS)
}

/**
 * Classify a provider failure from its error type, HTTP status and message.
 * Quota is checked before rate limiting since quota errors also arrive as 429.
 */
export function classifyProviderError(error: unknown): ProviderFailureType {
  if (error instanceof ProviderConfigError) return 'config'
  if (error instanceof ProviderConnectionError || error instanceof ProviderTimeoutError) return 'connection'

  const message = errorMessage(error)
  if (isQuotaError(message)) return 'quota'
  if (error instanceof ProviderHttpError) {
    if (error.status === 401 || error.status === 403) return 'auth'
    if (error.status === 429) return 'rate_limit'
  }
  if (isAuthenticationError(message)) return 'auth'
  if (isRateLimitError(message)) return 'rate_limit'
  if (includesAny(message, CONNECTION_KEYWORDS)) return 'connection'
  return 'other'
}

const FREE_PROVIDERS = [
  '  • ollama - runs locally: https://ollama.ai (completely free)',
  '  • gemini - API key: https://aistudio.google.com/app/apikey (free tier)',
  '  • groq - API key: https://console.groq.com/keys (free tier, very fast)',
  '  • huggingface - API key: https://huggingface.co/settings/tokens (free tier)'
]

function failureLines(type: ProviderFailureType, provider: string, error: unknown): string[] {
  const label = provider.toUpperCase()
  switch (type) {
    case 'config':
      return [
        'Provider configuration error',
        '',
        `Failed to initialize AI provider '${provider}'.`,
        '',
        `Details: ${errorMessage(error)}`,
        '',
        'Available free providers:',
        ...FREE_PROVIDERS,
        '',
        "Set 'provider' in config/resume_config.yaml and add API keys to config/secrets.yaml",
        'or export OPENAI_API_KEY, GEMINI_API_KEY, GROQ_API_KEY or HUGGINGFACE_API_KEY.'
      ]
    case 'quota':
      return [
        `${label} API quota exceeded`,
        '',
        `Your ${provider} account has no credits remaining.`,
        '',
        ...(provider === 'openai'
          ? [
              'Steps to fix:',
              '  1. Visit https://platform.openai.com/account/billing',
              '  2. Add a payment method or purchase credits',
              '  3. Verify your account has available quota'
            ]
          : ['Consider switching to a free provider:', ...FREE_PROVIDERS.slice(0, 3)])
      ]
    case 'auth':
      return [
        `${label} API authentication failed`,
        '',
        'Your API key is invalid or has been revoked.',
        '',
        'Steps to fix:',
        '  1. Check your API key in config/secrets.yaml or the environment',
        "  2. Get a new API key from the provider's website",
        '  3. Make sure there are no extra spaces or quotes around the key'
      ]
    case 'rate_limit':
      return [
        `${label} API rate limit exceeded`,
        '',
        "You're making requests too quickly. Please wait a moment and try again."
      ]
    case 'connection':
      return [
        `${label} connection error`,
        '',
        `Unable to connect to ${provider} servers.`,
        '',
        'Steps to fix:',
        ...(provider === 'ollama'
          ? [
              '  1. Make sure Ollama is installed: https://ollama.ai',
              '  2. Start Ollama: ollama serve',
              '  3. Pull the model: ollama pull llama3.2'
            ]
          : [
              '  1. Check your internet connection',
              "  2. Check the provider's status page",
              '  3. Try again in a few minutes'
            ])
      ]
    case 'other':
      return [
        `${label} API error`,
        '',
        `An error occurred while calling the ${provider} API.`,
        '',
        'Troubleshooting:',
        '  1. Check your API key in config/secrets.yaml',
        '  2. Verify the provider is set correctly in config/resume_config.yaml',
        '  3. Try switching to a different provider'
      ]
  }
}

/**
 * Friendly multi-line message for a failed provider call. With `verbose`
 * the raw error message is appended.
 */
export function describeProviderFailure(error: unknown, provider: string, verbose = false): string {
  const type = classifyProviderError(error)
  const lines = failureLines(type, provider, error)
  if (verbose && type !== 'config') {
    lines.push('', `Details: ${errorMessage(error)}`)
  }
  return lines.join('\n')
}

/** Error carrying the friendly message, with the original failure as its cause */
export class ProviderFailureError extends Error {
  constructor(
    readonly type: ProviderFailureType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ProviderFailureError'
  }
}

export function toProviderFailure(error: unknown, provider: string, verbose = false): ProviderFailureError {
  return new ProviderFailureError(classifyProviderError(error), describeProviderFailure(error, provider, verbose), {
    cause: error
  })
}
