import { config as loadEnv } from 'dotenv'
import { z } from 'zod'
import { AI_PROVIDERS } from '@shared/types'

// Load .env when running locally; CI and shells may supply env vars directly
if (process.env.NODE_ENV !== 'test') {
  loadEnv()
}

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined))

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Project root holding config/, docs/ and build/
  RESUME_ROOT: z.string().optional(),

  // Overrides ai_prompts.provider from resume_config.yaml
  RESUME_AI_PROVIDER: z.enum(AI_PROVIDERS).optional(),

  // API keys take precedence over config/secrets.yaml
  OPENAI_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,
  GROQ_API_KEY: optionalSecret,
  HUGGINGFACE_API_KEY: optionalSecret,

  DOXYGEN_BIN: z.string().min(1).default('doxygen'),
  JOB_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
})

export type Env = z.infer<typeof EnvSchema>

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source)
}

export const env: Env = parseEnv(process.env)
