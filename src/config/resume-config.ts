import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { ZodError } from 'zod'
import {
  resumeConfigSchema,
  secretsSchema,
  type AiPromptSettings,
  type KeyedProviderName,
  type OutputFilenameVars,
  type OutputPatternKey,
  type PathKey,
  type ProviderSettings,
  type ResumeConfigFile,
  type SecretsFile
} from '@shared/types'
import { ConfigError, errorMessage } from '../errors'
import { env as processEnv, type Env } from './env'
import { formatTimestamp } from '../utils/timestamp'
import { readTextIfExists } from '../utils/fs.util'

export const CONFIG_RELATIVE_PATH = 'config/resume_config.yaml'
export const SECRETS_RELATIVE_PATH = 'config/secrets.yaml'

const PLACEHOLDER = /\{([a-z_]+)\}/g

type EnvOverrides = Pick<
  Env,
  'RESUME_AI_PROVIDER' | 'OPENAI_API_KEY' | 'GEMINI_API_KEY' | 'GROQ_API_KEY' | 'HUGGINGFACE_API_KEY'
>

function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

function parseYamlFile(text: string, filePath: string): unknown {
  try {
    return parseYaml(text) ?? {}
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Loaded resume_config.yaml plus secrets, with helpers to resolve paths and
 * output filenames against the project root.
 */
export class ResumeConfig {
  constructor(
    readonly rootDir: string,
    readonly file: ResumeConfigFile,
    readonly secrets: SecretsFile,
    private readonly overrides: EnvOverrides = {},
    private readonly now: () => Date = () => new Date()
  ) {}

  get name(): string {
    return this.file.name
  }

  get prompts(): AiPromptSettings {
    return this.file.ai_prompts
  }

  get secretsPath(): string {
    return path.join(this.rootDir, SECRETS_RELATIVE_PATH)
  }

  path(key: PathKey): string {
    return path.resolve(this.rootDir, this.file.paths[key])
  }

  /**
   * Expand an output pattern. `name` and `timestamp` default to the config
   * name and the current time; any other placeholder must be supplied.
   */
  outputFilename(key: OutputPatternKey, vars: OutputFilenameVars = {}): string {
    const pattern = this.file.output_patterns[key]
    if (pattern === undefined) {
      throw new ConfigError(`Unknown output pattern key: ${key}`)
    }
    const values: Record<string, string | undefined> = {
      name: this.file.name,
      timestamp: formatTimestamp(this.now()),
      ...vars
    }
    return pattern.replace(PLACEHOLDER, (_match, placeholder: string) => {
      const value = values[placeholder]
      if (value === undefined) {
        throw new ConfigError(`Output pattern '${key}' needs a value for {${placeholder}}`)
      }
      return value
    })
  }

  providerSettings(): ProviderSettings {
    const ai = this.file.ai_prompts
    const apiKeys: Partial<Record<KeyedProviderName, string>> = {}
    const pick = (name: KeyedProviderName, fromEnv: string | undefined, fromFile: string | undefined) => {
      const value = fromEnv ?? fromFile?.trim()
      if (value) apiKeys[name] = value
    }
    pick('openai', this.overrides.OPENAI_API_KEY, this.secrets.openai_api_key)
    pick('gemini', this.overrides.GEMINI_API_KEY, this.secrets.gemini_api_key)
    pick('groq', this.overrides.GROQ_API_KEY, this.secrets.groq_api_key)
    pick('huggingface', this.overrides.HUGGINGFACE_API_KEY, this.secrets.huggingface_api_key)

    return {
      provider: this.overrides.RESUME_AI_PROVIDER ?? ai.provider,
      model: ai.model,
      temperature: ai.temperature,
      maxTokens: ai.max_tokens,
      ollamaBaseUrl: ai.ollama_base_url,
      ollamaModel: ai.ollama_model,
      apiKeys
    }
  }
}

export interface LoadConfigOptions {
  env?: EnvOverrides
  now?: () => Date
}

export async function loadResumeConfig(rootDir: string, options: LoadConfigOptions = {}): Promise<ResumeConfig> {
  const configPath = path.join(rootDir, CONFIG_RELATIVE_PATH)
  const configText = await readTextIfExists(configPath)
  if (configText === null) {
    throw new ConfigError(`Config file not found: ${configPath}`)
  }

  const parsedConfig = resumeConfigSchema.safeParse(parseYamlFile(configText, configPath))
  if (!parsedConfig.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${describeZodError(parsedConfig.error)}`)
  }

  const secretsPath = path.join(rootDir, SECRETS_RELATIVE_PATH)
  const secretsText = await readTextIfExists(secretsPath)
  let secrets: SecretsFile = {}
  if (secretsText !== null) {
    const parsedSecrets = secretsSchema.safeParse(parseYamlFile(secretsText, secretsPath))
    if (!parsedSecrets.success) {
      throw new ConfigError(`Invalid secrets ${secretsPath}: ${describeZodError(parsedSecrets.error)}`)
    }
    secrets = parsedSecrets.data
  }

  return new ResumeConfig(path.resolve(rootDir), parsedConfig.data, secrets, options.env ?? {}, options.now)
}

let cached: Promise<ResumeConfig> | undefined

/** Config for the project root named by RESUME_ROOT (or the working directory) */
export function getResumeConfig(): Promise<ResumeConfig> {
  cached ??= loadResumeConfig(processEnv.RESUME_ROOT ?? process.cwd(), { env: processEnv })
  return cached
}
