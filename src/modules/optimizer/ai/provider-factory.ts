import { AI_PROVIDERS, type KeyedProviderName, type ProviderSettings } from '@shared/types'
import { ProviderConfigError } from '../../../errors'
import {
  createGroqProvider,
  createOpenAiProvider,
  GeminiProvider,
  HuggingFaceProvider,
  OllamaProvider,
  type AiProvider
} from './providers'

export type ProviderFactoryInput = Omit<ProviderSettings, 'provider'> & { provider: string }

function requireKey(apiKeys: ProviderSettings['apiKeys'], provider: KeyedProviderName): string {
  const key = apiKeys[provider]
  if (!key) {
    throw new ProviderConfigError(`${provider}_api_key not found in config`)
  }
  return key
}

/**
 * Build the provider named in settings. The name is matched
 * case-insensitively; key-based providers need their API key.
 */
export function createProvider(settings: ProviderFactoryInput): AiProvider {
  const { apiKeys } = settings

  switch (settings.provider.trim().toLowerCase()) {
    case 'openai':
      return createOpenAiProvider(requireKey(apiKeys, 'openai'))
    case 'ollama':
      return new OllamaProvider(settings.ollamaBaseUrl, settings.ollamaModel)
    case 'gemini':
      return new GeminiProvider(requireKey(apiKeys, 'gemini'))
    case 'groq':
      return createGroqProvider(requireKey(apiKeys, 'groq'))
    case 'huggingface':
      return new HuggingFaceProvider(requireKey(apiKeys, 'huggingface'))
    default:
      throw new ProviderConfigError(`Unknown provider: ${settings.provider}. Supported: ${AI_PROVIDERS.join(', ')}`)
  }
}
