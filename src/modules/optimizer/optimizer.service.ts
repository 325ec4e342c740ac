import path from 'node:path'
import type { Logger } from 'pino'
import type { OptimizationResponse, ProviderSettings } from '@shared/types'
import type { ResumeConfig } from '../../config/resume-config'
import { logger as rootLogger } from '../../logger'
import { SourceNotFoundError } from '../../errors'
import { formatTimestamp } from '../../utils/timestamp'
import { readTextIfExists, writeFileEnsuringDir } from '../../utils/fs.util'
import { ChangelogService } from '../changelog/changelog.service'
import { createProvider } from './ai/provider-factory'
import type { AiProvider } from './ai/providers'
import { toProviderFailure } from './error-classifier'
import { fetchJobDescription } from './job-description'
import { buildOptimizationPrompt } from './prompts'
import { parseOptimizationResponse } from './response-parser'

export interface OptimizeRequest {
  jobUrl: string
  company?: string
  /** Append raw provider errors to failure messages */
  verbose?: boolean
}

export interface OptimizeResult {
  resumePath: string
  coverLetterPath: string
  changelogPath: string
  timestamp: string
  provider: string
}

export type OptimizeProgressEvent =
  | { stage: 'fetched'; chars: number }
  | { stage: 'resume'; chars: number }
  | { stage: 'generating'; provider: string }
  | { stage: 'saved'; kind: 'resume' | 'cover_letter' | 'changelog'; path: string }

export interface OptimizerDeps {
  fetchJob?: (url: string) => Promise<string>
  providerFor?: (config: ResumeConfig) => AiProvider
  changelog?: ChangelogService
  now?: () => Date
  onProgress?: (event: OptimizeProgressEvent) => void
  log?: Logger
}

/**
 * Tailor the baseline resume to a job posting with one model request and
 * store the optimized resume, cover letter and changelog entry.
 */
export class OptimizerService {
  private readonly fetchJob: (url: string) => Promise<string>
  private readonly providerFor: (config: ResumeConfig) => AiProvider
  private readonly changelog: ChangelogService
  private readonly now: () => Date
  private readonly log: Logger

  constructor(
    private readonly config: ResumeConfig,
    private readonly deps: OptimizerDeps = {}
  ) {
    this.fetchJob = deps.fetchJob ?? ((url) => fetchJobDescription(url))
    this.providerFor = deps.providerFor ?? ((cfg) => createProvider(cfg.providerSettings()))
    this.now = deps.now ?? (() => new Date())
    this.changelog = deps.changelog ?? new ChangelogService(config.path('changelog'), this.now)
    this.log = deps.log ?? rootLogger
  }

  async optimize(request: OptimizeRequest): Promise<OptimizeResult> {
    const jobDescription = await this.fetchJob(request.jobUrl)
    this.progress({ stage: 'fetched', chars: jobDescription.length })

    const resumePath = this.config.path('resume_source')
    const resume = await readTextIfExists(resumePath)
    if (resume === null) {
      throw new SourceNotFoundError('Resume file', resumePath)
    }
    this.progress({ stage: 'resume', chars: resume.length })

    const settings = this.config.providerSettings()
    const response = await this.generate(settings, jobDescription, resume, request.verbose ?? false)

    return this.saveOutputs(response, request, settings.provider)
  }

  private async generate(
    settings: ProviderSettings,
    jobDescription: string,
    resume: string,
    verbose: boolean
  ): Promise<OptimizationResponse> {
    let provider: AiProvider
    try {
      provider = this.providerFor(this.config)
    } catch (err) {
      throw toProviderFailure(err, settings.provider, verbose)
    }
    this.progress({ stage: 'generating', provider: provider.name })

    const prompt = await buildOptimizationPrompt(jobDescription, resume, this.config.prompts)

    let content: string
    try {
      content = await provider.generate(prompt.system, prompt.user, {
        model: settings.model,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens
      })
    } catch (err) {
      this.log.warn({ err, provider: provider.name }, 'AI provider call failed')
      throw toProviderFailure(err, provider.name, verbose)
    }
    this.log.debug({ provider: provider.name, chars: content.length }, 'AI response received')

    // Unusable replies surface as OptimizationResponseError naming the debug file
    return parseOptimizationResponse(content, {
      debugDir: this.config.path('optimized_dir'),
      now: this.now
    })
  }

  private async saveOutputs(
    response: OptimizationResponse,
    request: OptimizeRequest,
    provider: string
  ): Promise<OptimizeResult> {
    const outDir = this.config.path('optimized_dir')
    const timestamp = formatTimestamp(this.now())

    const resumePath = await writeFileEnsuringDir(
      path.join(outDir, this.config.outputFilename('optimized_resume', { timestamp })),
      response.optimized_resume
    )
    this.progress({ stage: 'saved', kind: 'resume', path: resumePath })

    const coverLetterPath = await writeFileEnsuringDir(
      path.join(outDir, this.config.outputFilename('optimized_cover_letter', { timestamp })),
      response.cover_letter
    )
    this.progress({ stage: 'saved', kind: 'cover_letter', path: coverLetterPath })

    const changelogPath = await this.changelog.appendOptimization({
      jobUrl: request.jobUrl,
      company: request.company,
      timestamp,
      changes: response.changelog
    })
    this.progress({ stage: 'saved', kind: 'changelog', path: changelogPath })

    return { resumePath, coverLetterPath, changelogPath, timestamp, provider }
  }

  private progress(event: OptimizeProgressEvent): void {
    this.deps.onProgress?.(event)
  }
}
