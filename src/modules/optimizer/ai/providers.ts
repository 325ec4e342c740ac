import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'
import type { Logger } from 'pino'
import type { AIProviderName } from '@shared/types'
import { logger } from '../../../logger'
import { ProviderHttpError, ProviderResponseError } from '../../../errors'
import { postJson } from './provider-http'

export interface GenerateOptions {
  /** Model override; each provider has its own default */
  model?: string
  temperature: number
  maxTokens: number
}

export interface AiProvider {
  readonly name: AIProviderName
  generate(systemPrompt: string, userPrompt: string, options: GenerateOptions): Promise<string>
}

export const DEFAULT_MODELS = {
  openai: 'gpt-4o',
  groq: 'llama-3.1-70b-versatile',
  gemini: 'gemini-1.5-flash',
  huggingface: 'mistralai/Mistral-7B-Instruct-v0.2'
} as const

const CHAT_TIMEOUT_MS = 120_000
const OLLAMA_TIMEOUT_MS = 300_000
const GEMINI_TIMEOUT_MS = 120_000
const HUGGINGFACE_TIMEOUT_MS = 60_000

// Free inference tier caps generated tokens
const HUGGINGFACE_MAX_NEW_TOKENS = 512

const GEMINI_MAX_RETRIES = 3
const GEMINI_RETRY_BASE_MS = 30_000

/** System and user prompts for providers without a system role */
function combinePrompts(systemPrompt: string, userPrompt: string): string {
  return `${systemPrompt}\n\n${userPrompt}`
}

// ── OpenAI-compatible chat completions (OpenAI, Groq) ──────────────────────

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() })
      })
    )
    .min(1),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional()
})

export class OpenAiCompatibleProvider implements AiProvider {
  constructor(
    readonly name: 'openai' | 'groq',
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly defaultModel: string,
    private readonly log: Logger = logger
  ) {}

  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions): Promise<string> {
    const model = options.model ?? this.defaultModel
    const data = await postJson(
      this.name,
      `${this.baseUrl}/chat/completions`,
      {
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens
      },
      chatCompletionSchema,
      { headers: { Authorization: `Bearer ${this.apiKey}` }, timeoutMs: CHAT_TIMEOUT_MS }
    )

    this.log.info(
      { provider: this.name, model: data.model ?? model, tokens: data.usage?.total_tokens },
      'Chat completion succeeded'
    )
    return data.choices[0].message.content ?? ''
  }
}

export function createOpenAiProvider(apiKey: string): OpenAiCompatibleProvider {
  return new OpenAiCompatibleProvider('openai', apiKey, 'https://api.openai.com/v1', DEFAULT_MODELS.openai)
}

export function createGroqProvider(apiKey: string): OpenAiCompatibleProvider {
  return new OpenAiCompatibleProvider('groq', apiKey, 'https://api.groq.com/openai/v1', DEFAULT_MODELS.groq)
}

// ── Ollama (local) ─────────────────────────────────────────────────────────

const ollamaGenerateSchema = z.object({ response: z.string() })

export class OllamaProvider implements AiProvider {
  readonly name = 'ollama'

  constructor(
    private readonly baseUrl: string,
    private readonly defaultModel: string,
    private readonly log: Logger = logger
  ) {}

  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions): Promise<string> {
    const model = options.model ?? this.defaultModel
    const data = await postJson(
      this.name,
      `${this.baseUrl.replace(/\/+$/, '')}/api/generate`,
      {
        model,
        prompt: combinePrompts(systemPrompt, userPrompt),
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens
        }
      },
      ollamaGenerateSchema,
      { timeoutMs: OLLAMA_TIMEOUT_MS }
    )
    this.log.info({ provider: this.name, model }, 'Ollama generation succeeded')
    return data.response
  }
}

// ── Google Gemini ──────────────────────────────────────────────────────────

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1)
        })
      })
    )
    .min(1)
})

export interface GeminiProviderOptions {
  sleep?: (ms: number) => Promise<unknown>
  log?: Logger
}

export class GeminiProvider implements AiProvider {
  readonly name = 'gemini'
  private readonly sleep: (ms: number) => Promise<unknown>
  private readonly log: Logger

  constructor(
    private readonly apiKey: string,
    options: GeminiProviderOptions = {}
  ) {
    this.sleep = options.sleep ?? delay
    this.log = options.log ?? logger
  }

  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions): Promise<string> {
    const model = options.model ?? DEFAULT_MODELS.gemini
    const url =
      `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(model)}:generateContent` +
      `?key=${encodeURIComponent(this.apiKey)}`
    const payload = {
      contents: [{ parts: [{ text: combinePrompts(systemPrompt, userPrompt) }] }],
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens
      }
    }

    for (let attempt = 0; ; attempt++) {
      try {
        const data = await postJson(this.name, url, payload, geminiResponseSchema, { timeoutMs: GEMINI_TIMEOUT_MS })
        this.log.info({ provider: this.name, model, attempt }, 'Gemini generation succeeded')
        return data.candidates[0].content.parts[0].text
      } catch (err) {
        const rateLimited = err instanceof ProviderHttpError && err.status === 429
        if (!rateLimited || attempt >= GEMINI_MAX_RETRIES) {
          throw err
        }
        const waitMs = GEMINI_RETRY_BASE_MS * 2 ** attempt
        this.log.warn({ provider: this.name, attempt: attempt + 1, waitMs }, 'Gemini rate limited, retrying')
        await this.sleep(waitMs)
      }
    }
  }
}

// ── Hugging Face Inference API ─────────────────────────────────────────────

const huggingFaceResponseSchema = z.unknown()
const generatedTextSchema = z.object({ generated_text: z.string().optional() })

export class HuggingFaceProvider implements AiProvider {
  readonly name = 'huggingface'

  constructor(
    private readonly apiKey: string,
    private readonly log: Logger = logger
  ) {}

  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions): Promise<string> {
    const model = options.model ?? DEFAULT_MODELS.huggingface
    const fullPrompt = combinePrompts(systemPrompt, userPrompt)
    const result = await postJson(
      this.name,
      `https://api-inference.huggingface.co/models/${model}`,
      {
        inputs: fullPrompt,
        parameters: {
          temperature: options.temperature,
          max_new_tokens: Math.min(options.maxTokens, HUGGINGFACE_MAX_NEW_TOKENS)
        }
      },
      huggingFaceResponseSchema,
      { headers: { Authorization: `Bearer ${this.apiKey}` }, timeoutMs: HUGGINGFACE_TIMEOUT_MS }
    )
    this.log.info({ provider: this.name, model }, 'Hugging Face generation succeeded')

    if (Array.isArray(result) && result.length > 0) {
      const first = generatedTextSchema.safeParse(result[0])
      if (!first.success) {
        throw new ProviderResponseError(this.name, 'generated_text is not a string')
      }
      return (first.data.generated_text ?? '').replaceAll(fullPrompt, '').trim()
    }
    return JSON.stringify(result)
  }
}
