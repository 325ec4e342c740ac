import fs from 'node:fs/promises'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { OptimizerService, type OptimizeProgressEvent } from '../optimizer.service'
import type { AiProvider } from '../ai/providers'
import { ProviderFailureError } from '../error-classifier'
import { OptimizationResponseError, ProviderHttpError, SourceNotFoundError } from '../../../errors'
import {
  createResumeWorkspace,
  FIXED_NOW,
  FIXED_TIMESTAMP,
  type ResumeWorkspace
} from '../../../../tests/helpers/resume-workspace'

vi.mock('../../../logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}))

const REPLY = JSON.stringify({
  optimized_resume: '# Jane Doe\n## Summary\nTailored for platform work.',
  cover_letter: 'Dear hiring team,',
  changelog: ['Rewrote summary', 'Moved Go to the top of skills']
})

function fakeProvider(generate: AiProvider['generate']): AiProvider {
  return { name: 'openai', generate }
}

describe('OptimizerService', () => {
  let workspace: ResumeWorkspace
  const fetchJob = vi.fn()
  const generate = vi.fn()

  beforeEach(async () => {
    workspace = await createResumeWorkspace()
    fetchJob.mockReset()
    generate.mockReset()
    fetchJob.mockResolvedValue('Platform engineer, TypeScript and Go')
    generate.mockResolvedValue(REPLY)
  })

  afterEach(async () => {
    await workspace.cleanup()
  })

  const createService = (onProgress?: (event: OptimizeProgressEvent) => void) =>
    new OptimizerService(workspace.config, {
      fetchJob,
      providerFor: () => fakeProvider(generate),
      now: FIXED_NOW,
      onProgress
    })

  it('writes the resume, cover letter and changelog entry', async () => {
    const result = await createService().optimize({
      jobUrl: 'https://jobs.example.com/42',
      company: 'Example Corp'
    })

    expect(result).toEqual({
      resumePath: workspace.file(`build/optimized/resume_optimized_${FIXED_TIMESTAMP}.md`),
      coverLetterPath: workspace.file(`build/optimized/cover_letter_${FIXED_TIMESTAMP}.md`),
      changelogPath: workspace.file('CHANGELOG.md'),
      timestamp: FIXED_TIMESTAMP,
      provider: 'openai'
    })
    expect(await fs.readFile(result.resumePath, 'utf-8')).toBe('# Jane Doe\n## Summary\nTailored for platform work.')
    expect(await fs.readFile(result.coverLetterPath, 'utf-8')).toBe('Dear hiring team,')
    expect(await fs.readFile(result.changelogPath, 'utf-8')).toBe(
      [
        '# Resume Optimization Changelog',
        '',
        '',
        '## 2024-03-05 - Resume Optimization',
        '',
        '**Job Posting:** https://jobs.example.com/42',
        '**Company:** Example Corp',
        `**Timestamp:** ${FIXED_TIMESTAMP}`,
        '',
        '### Changes Made:',
        '- Rewrote summary',
        '- Moved Go to the top of skills',
        '',
        '---',
        ''
      ].join('\n')
    )
  })

  it('sends the configured prompts and generation settings', async () => {
    await createService().optimize({ jobUrl: 'https://jobs.example.com/42' })

    const [system, user, options] = generate.mock.calls[0]
    expect(system).toBe('You tailor resumes.')
    expect(user).toContain('JOB DESCRIPTION:\nPlatform engineer, TypeScript and Go\n')
    expect(user).toContain('CURRENT RESUME:\n# Jane Doe\n')
    expect(user).toContain('Keep it under 300 words.')
    expect(options).toEqual({ model: undefined, temperature: 0.7, maxTokens: 8000 })
  })

  it('reports progress in order', async () => {
    const stages: string[] = []
    await createService((event) => stages.push(event.stage === 'saved' ? `saved:${event.kind}` : event.stage)).optimize({
      jobUrl: 'https://jobs.example.com/42'
    })

    expect(stages).toEqual(['fetched', 'resume', 'generating', 'saved:resume', 'saved:cover_letter', 'saved:changelog'])
  })

  it('fails before calling the model when the resume is missing', async () => {
    await fs.rm(workspace.file('docs/resume.md'))

    await expect(createService().optimize({ jobUrl: 'https://jobs.example.com/42' })).rejects.toBeInstanceOf(
      SourceNotFoundError
    )
    expect(generate).not.toHaveBeenCalled()
  })

  it('turns provider errors into friendly failures', async () => {
    generate.mockRejectedValue(new ProviderHttpError('openai', 401, 'invalid_api_key'))

    const error = await createService()
      .optimize({ jobUrl: 'https://jobs.example.com/42', verbose: true })
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ProviderFailureError)
    expect(error).toMatchObject({ type: 'auth' })
    expect(String(error)).toContain('Details: openai request failed (HTTP 401): invalid_api_key')
  })

  it('keeps response parse errors as they are', async () => {
    generate.mockResolvedValue('Sorry, no JSON today')

    await expect(createService().optimize({ jobUrl: 'https://jobs.example.com/42' })).rejects.toBeInstanceOf(
      OptimizationResponseError
    )
    await expect(fs.readFile(workspace.file('CHANGELOG.md'), 'utf-8')).rejects.toThrow()
  })

  it('explains a missing API key', async () => {
    const service = new OptimizerService(workspace.config, { fetchJob, now: FIXED_NOW })

    const error = await service.optimize({ jobUrl: 'https://jobs.example.com/42' }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ProviderFailureError)
    expect(error).toMatchObject({ type: 'config' })
    expect(String(error)).toContain('Details: openai_api_key not found in config')
  })
})
