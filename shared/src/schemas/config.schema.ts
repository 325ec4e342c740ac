import { z } from "zod"
import { AI_PROVIDERS } from "../config.types"

export const pathsSchema = z.object({
  resume_source: z.string().default("docs/resume.md"),
  resume_dox: z.string().default("docs/resume.dox"),
  build_dir: z.string().default("build"),
  optimized_dir: z.string().default("build/optimized"),
  changelog: z.string().default("CHANGELOG.md"),
  doxyfile: z.string().default("Doxyfile"),
})

export const outputPatternsSchema = z.object({
  baseline_docx: z.string().default("{name}_Resume.docx"),
  baseline_pdf: z.string().default("{name}_Resume.pdf"),
  optimized_docx: z.string().default("{name}_Resume_{company}_{timestamp}.docx"),
  optimized_docx_fallback: z.string().default("{name}_Resume_optimized_{timestamp}.docx"),
  optimized_pdf: z.string().default("{name}_Resume_{company}_{timestamp}.pdf"),
  optimized_pdf_fallback: z.string().default("{name}_Resume_optimized_{timestamp}.pdf"),
  optimized_dox: z.string().default("{name}_Resume_{company}_{timestamp}.dox"),
  optimized_dox_fallback: z.string().default("{name}_Resume_optimized_{timestamp}.dox"),
  optimized_resume: z.string().default("resume_optimized_{timestamp}.md"),
  optimized_cover_letter: z.string().default("cover_letter_{timestamp}.md"),
})

export const aiPromptsSchema = z.object({
  provider: z.enum(AI_PROVIDERS).default("openai"),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().default(8000),
  ollama_base_url: z.string().url().default("http://localhost:11434"),
  ollama_model: z.string().min(1).default("llama3.2"),
  resume_optimization_prompt: z.string().min(1, "resume_optimization_prompt is required"),
  cover_letter_prompt: z.string().default(""),
  changelog_instructions: z.string().default(""),
})

export const resumeConfigSchema = z.object({
  name: z.string().min(1).default("Resume"),
  paths: pathsSchema.default({}),
  output_patterns: outputPatternsSchema.default({}),
  ai_prompts: aiPromptsSchema,
})

export const secretsSchema = z
  .object({
    openai_api_key: z.string().optional(),
    gemini_api_key: z.string().optional(),
    groq_api_key: z.string().optional(),
    huggingface_api_key: z.string().optional(),
  })
  .passthrough()
