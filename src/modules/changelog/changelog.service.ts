import fs from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import Handlebars from 'handlebars'
import type { TemplateDelegate } from 'handlebars'
import type { Logger } from 'pino'
import { logger as rootLogger } from '../../logger'
import { formatDay } from '../../utils/timestamp'
import { readTextIfExists, writeFileEnsuringDir } from '../../utils/fs.util'

const TEMPLATE_ROOT = fileURLToPath(new URL('./templates/', import.meta.url))

export const CHANGELOG_HEADER = '# Resume Optimization Changelog\n\n'

export interface OptimizationEntry {
  jobUrl: string
  company?: string
  /** Timestamp shared with the optimized files, `YYYYMMDD_HHMMSS` */
  timestamp: string
  /** Markdown list of changes reported by the model */
  changes: string
}

export interface PromotionEntry {
  /** File name of the promoted resume */
  source: string
  /** File name of the baseline backup */
  backup: string
  reason?: string
}

type EntryContext<T> = T & { date: string }

export class ChangelogService {
  private optimizationTemplate: TemplateDelegate<EntryContext<OptimizationEntry>> | null = null
  private promotionTemplate: TemplateDelegate<EntryContext<PromotionEntry>> | null = null

  constructor(
    readonly changelogPath: string,
    private readonly now: () => Date = () => new Date(),
    private readonly log: Logger = rootLogger
  ) {}

  async appendOptimization(entry: OptimizationEntry): Promise<string> {
    this.optimizationTemplate ??= await this.loadTemplate<EntryContext<OptimizationEntry>>('optimization-entry.hbs')
    return this.append(this.optimizationTemplate({ ...entry, date: formatDay(this.now()) }))
  }

  async appendPromotion(entry: PromotionEntry): Promise<string> {
    this.promotionTemplate ??= await this.loadTemplate<EntryContext<PromotionEntry>>('promotion-entry.hbs')
    return this.append(this.promotionTemplate({ ...entry, date: formatDay(this.now()) }))
  }

  private async append(entry: string): Promise<string> {
    const current = (await readTextIfExists(this.changelogPath)) ?? CHANGELOG_HEADER
    await writeFileEnsuringDir(this.changelogPath, current + entry)
    this.log.info({ changelog: this.changelogPath }, 'Changelog updated')
    return this.changelogPath
  }

  private async loadTemplate<T>(fileName: string): Promise<TemplateDelegate<T>> {
    const contents = await fs.readFile(`${TEMPLATE_ROOT}${fileName}`, 'utf-8')
    // Markdown output; URLs and company names stay as written
    return Handlebars.compile<T>(contents, { noEscape: true })
  }
}
