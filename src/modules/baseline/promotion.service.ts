import fs from 'node:fs/promises'
import path from 'node:path'
import type { Logger } from 'pino'
import type { ResumeConfig } from '../../config/resume-config'
import { logger as rootLogger } from '../../logger'
import { SourceNotFoundError } from '../../errors'
import { formatTimestamp } from '../../utils/timestamp'
import { readTextIfExists, writeFileEnsuringDir } from '../../utils/fs.util'
import { BuildService, type BuildStepResult } from '../build/build.service'
import { ChangelogService } from '../changelog/changelog.service'

export const BACKUP_DIR = 'backups'

export interface PromoteOptions {
  reason?: string
}

export interface PromoteResult {
  baselinePath: string
  /** Null when there was no baseline to back up */
  backupPath: string | null
  changelogPath: string
  outputs: BuildStepResult[]
}

export type PromotionProgressEvent =
  | { stage: 'backup'; path: string }
  | { stage: 'promoted'; path: string }
  | { stage: 'changelog'; path: string }
  | { stage: 'built'; result: BuildStepResult }
  | { stage: 'restored'; path: string }

export interface PromotionDeps {
  build?: BuildService
  changelog?: ChangelogService
  now?: () => Date
  onProgress?: (event: PromotionProgressEvent) => void
  log?: Logger
}

/** Put `content` back at `filePath`, or remove the file when it did not exist */
async function restoreFile(filePath: string, content: string | null): Promise<void> {
  if (content === null) {
    await fs.rm(filePath, { force: true })
  } else {
    await fs.writeFile(filePath, content, 'utf-8')
  }
}

/**
 * Make an optimized resume the new baseline. The previous baseline is backed
 * up under `<build_dir>/backups`; if any later step fails the baseline, its
 * DOX and the changelog are restored before the error is rethrown.
 */
export class PromotionService {
  private readonly build: BuildService
  private readonly changelog: ChangelogService
  private readonly now: () => Date
  private readonly log: Logger

  constructor(
    private readonly config: ResumeConfig,
    private readonly deps: PromotionDeps = {}
  ) {
    this.now = deps.now ?? (() => new Date())
    this.log = deps.log ?? rootLogger
    this.build = deps.build ?? new BuildService(config, { now: this.now, log: this.log })
    this.changelog = deps.changelog ?? new ChangelogService(config.path('changelog'), this.now, this.log)
  }

  async promote(optimizedPath: string, options: PromoteOptions = {}): Promise<PromoteResult> {
    const sourcePath = path.resolve(optimizedPath)
    const optimized = await readTextIfExists(sourcePath)
    if (optimized === null) {
      throw new SourceNotFoundError('Optimized resume file', sourcePath)
    }

    const baselinePath = this.config.path('resume_source')
    const doxPath = this.config.path('resume_dox')
    const previousBaseline = await readTextIfExists(baselinePath)
    const previousDox = await readTextIfExists(doxPath)
    const previousChangelog = await readTextIfExists(this.changelog.changelogPath)

    const backupPath = path.join(
      this.config.path('build_dir'),
      BACKUP_DIR,
      `resume_backup_${formatTimestamp(this.now())}.md`
    )
    if (previousBaseline !== null) {
      await writeFileEnsuringDir(backupPath, previousBaseline)
      this.progress({ stage: 'backup', path: backupPath })
    }

    try {
      await writeFileEnsuringDir(baselinePath, optimized)
      this.progress({ stage: 'promoted', path: baselinePath })

      const changelogPath = await this.changelog.appendPromotion({
        source: path.basename(sourcePath),
        backup: path.basename(backupPath),
        reason: options.reason
      })
      this.progress({ stage: 'changelog', path: changelogPath })

      const outputs = await this.build.buildBaseline({
        skipHtml: true,
        onStep: (result) => this.progress({ stage: 'built', result })
      })

      this.log.info({ source: sourcePath, baseline: baselinePath }, 'Promoted optimized resume to baseline')
      return {
        baselinePath,
        backupPath: previousBaseline === null ? null : backupPath,
        changelogPath,
        outputs
      }
    } catch (err) {
      this.log.warn({ err, baseline: baselinePath }, 'Promotion failed, restoring baseline and changelog')
      const restored = await this.restoreAll([
        [baselinePath, previousBaseline],
        [doxPath, previousDox],
        [this.changelog.changelogPath, previousChangelog]
      ])
      if (restored) {
        this.progress({ stage: 'restored', path: baselinePath })
      }
      throw err
    }
  }

  /** Restore every snapshot; a failed restore is logged so the promotion error still surfaces */
  private async restoreAll(snapshots: Array<[string, string | null]>): Promise<boolean> {
    let restored = true
    for (const [filePath, content] of snapshots) {
      try {
        await restoreFile(filePath, content)
      } catch (restoreErr) {
        restored = false
        this.log.error({ err: restoreErr, path: filePath }, 'Failed to restore file after promotion error')
      }
    }
    return restored
  }

  private progress(event: PromotionProgressEvent): void {
    this.deps.onProgress?.(event)
  }
}
