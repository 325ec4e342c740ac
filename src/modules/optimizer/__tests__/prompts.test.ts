import { describe, it, expect } from 'vitest'
import { buildOptimizationPrompt } from '../prompts'

describe('buildOptimizationPrompt', () => {
  it('uses the configured system prompt and embeds the inputs', async () => {
    const prompt = await buildOptimizationPrompt('Build APIs in TypeScript & Go', '# Jane\n- Shipped <things>', {
      resume_optimization_prompt: 'You are a resume editor.',
      cover_letter_prompt: 'Keep it short.',
      changelog_instructions: 'List every change.'
    })

    expect(prompt.system).toBe('You are a resume editor.')
    expect(prompt.user).toContain('JOB DESCRIPTION:\nBuild APIs in TypeScript & Go\n\nCURRENT RESUME:\n# Jane\n- Shipped <things>\n')
    expect(prompt.user).toContain('  "changelog": "<list of changes made, formatted as markdown bullets>"\n}\n\nList every change.\n\nKeep it short.\n')
  })

  it('leaves out empty instructions', async () => {
    const prompt = await buildOptimizationPrompt('JD', 'Resume', {
      resume_optimization_prompt: 'System',
      cover_letter_prompt: '',
      changelog_instructions: '  '
    })

    expect(prompt.user.endsWith('formatted as markdown bullets>"\n}\n')).toBe(true)
  })
})
