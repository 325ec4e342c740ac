import fs from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import Handlebars from 'handlebars'
import type { TemplateDelegate } from 'handlebars'
import type { AiPromptSettings } from '@shared/types'

const USER_PROMPT_TEMPLATE = fileURLToPath(new URL('./templates/optimize-user-prompt.hbs', import.meta.url))

interface UserPromptContext {
  jobDescription: string
  resume: string
  changelogInstructions: string
  coverLetterPrompt: string
}

export interface OptimizationPrompt {
  system: string
  user: string
}

let userPromptTemplate: TemplateDelegate<UserPromptContext> | null = null

async function loadUserPromptTemplate(): Promise<TemplateDelegate<UserPromptContext>> {
  if (!userPromptTemplate) {
    const contents = await fs.readFile(USER_PROMPT_TEMPLATE, 'utf-8')
    // Prompts are plain text, not HTML
    userPromptTemplate = Handlebars.compile<UserPromptContext>(contents, { noEscape: true })
  }
  return userPromptTemplate
}

export async function buildOptimizationPrompt(
  jobDescription: string,
  resume: string,
  prompts: Pick<AiPromptSettings, 'resume_optimization_prompt' | 'cover_letter_prompt' | 'changelog_instructions'>
): Promise<OptimizationPrompt> {
  const template = await loadUserPromptTemplate()
  return {
    system: prompts.resume_optimization_prompt,
    user: template({
      jobDescription,
      resume,
      changelogInstructions: prompts.changelog_instructions.trim(),
      coverLetterPrompt: prompts.cover_letter_prompt.trim()
    })
  }
}
