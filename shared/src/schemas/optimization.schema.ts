import { z } from "zod"

/**
 * Changelog text may come back as markdown or as a list of change lines.
 * Lists are folded into markdown bullets.
 */
const changelogSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    Array.isArray(value)
      ? value
          .map((line) => line.trim())
          .filter(Boolean)
          .map((line) => (/^[-*] /.test(line) ? line : `- ${line}`))
          .join("\n")
      : value.trim()
  )

export const optimizationResponseSchema = z.object({
  optimized_resume: z.string(),
  cover_letter: z.string(),
  changelog: changelogSchema,
})

export const OPTIMIZATION_RESPONSE_FIELDS = ["optimized_resume", "cover_letter", "changelog"] as const

export type OptimizationResponse = z.infer<typeof optimizationResponseSchema>
