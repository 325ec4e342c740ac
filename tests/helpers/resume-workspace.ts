import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { loadResumeConfig, type ResumeConfig } from '../../src/config/resume-config'

export const SAMPLE_RESUME = [
  '# Jane Doe',
  'jane@example.com | Springfield',
  '',
  '## Experience',
  '',
  '### Example Corp',
  '*Senior Engineer, 2021 - Present*',
  '- Shipped the **billing** rewrite',
  ''
].join('\n')

export const SAMPLE_CONFIG = `name: Jane_Doe
ai_prompts:
  provider: openai
  resume_optimization_prompt: You tailor resumes.
  cover_letter_prompt: Keep it under 300 words.
  changelog_instructions: List each change as a bullet.
`

/** Fixed clock: 2024-03-05 14:07:09 local time */
export const FIXED_NOW = () => new Date(2024, 2, 5, 14, 7, 9)
export const FIXED_TIMESTAMP = '20240305_140709'

export interface ResumeWorkspace {
  root: string
  config: ResumeConfig
  file: (relative: string) => string
  cleanup: () => Promise<void>
}

/**
 * A throwaway project root with config/resume_config.yaml and docs/resume.md.
 */
export async function createResumeWorkspace(
  options: { configYaml?: string; resume?: string | null; secretsYaml?: string } = {}
): Promise<ResumeWorkspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-kit-'))
  await fs.mkdir(path.join(root, 'config'), { recursive: true })
  await fs.mkdir(path.join(root, 'docs'), { recursive: true })
  await fs.writeFile(path.join(root, 'config', 'resume_config.yaml'), options.configYaml ?? SAMPLE_CONFIG)
  if (options.secretsYaml !== undefined) {
    await fs.writeFile(path.join(root, 'config', 'secrets.yaml'), options.secretsYaml)
  }
  if (options.resume !== null) {
    await fs.writeFile(path.join(root, 'docs', 'resume.md'), options.resume ?? SAMPLE_RESUME)
  }

  const config = await loadResumeConfig(root, { env: {}, now: FIXED_NOW })
  return {
    root,
    config,
    file: (relative) => path.join(root, relative),
    cleanup: () => fs.rm(root, { recursive: true, force: true })
  }
}
