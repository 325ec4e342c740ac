import type { z } from "zod"
import type {
  resumeConfigSchema,
  secretsSchema,
  aiPromptsSchema,
  pathsSchema,
  outputPatternsSchema,
} from "./schemas/config.schema"

/** Supported AI providers */
export const AI_PROVIDERS = ["openai", "ollama", "gemini", "groq", "huggingface"] as const

export type AIProviderName = (typeof AI_PROVIDERS)[number]

/** Providers that authenticate with an API key */
export type KeyedProviderName = Exclude<AIProviderName, "ollama">

export type ResumeConfigFile = z.infer<typeof resumeConfigSchema>
export type SecretsFile = z.infer<typeof secretsSchema>
export type AiPromptSettings = z.infer<typeof aiPromptsSchema>

export type PathKey = keyof z.infer<typeof pathsSchema>
export type OutputPatternKey = keyof z.infer<typeof outputPatternsSchema>

/** Placeholders accepted by output filename patterns */
export interface OutputFilenameVars {
  name?: string
  timestamp?: string
  company?: string
  job_title?: string
}

/**
 * Provider configuration merged from resume_config.yaml, secrets.yaml and the
 * environment. API keys are absent when neither source sets them.
 */
export interface ProviderSettings {
  provider: AIProviderName
  /** Model override; each provider falls back to its own default when unset */
  model?: string
  temperature: number
  maxTokens: number
  ollamaBaseUrl: string
  ollamaModel: string
  apiKeys: Partial<Record<KeyedProviderName, string>>
}
