import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ChangelogService, CHANGELOG_HEADER } from '../changelog.service'

vi.mock('../../../logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}))

const NOW = () => new Date(2025, 0, 28, 12, 0, 0)

describe('ChangelogService', () => {
  let dir: string
  let changelogPath: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-kit-changelog-'))
    changelogPath = path.join(dir, 'CHANGELOG.md')
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('starts a new changelog with a header', async () => {
    await new ChangelogService(changelogPath, NOW).appendOptimization({
      jobUrl: 'https://jobs.example.com/1',
      timestamp: '20250128_120000',
      changes: '- Added metrics'
    })

    expect(await fs.readFile(changelogPath, 'utf-8')).toBe(
      CHANGELOG_HEADER +
        '\n## 2025-01-28 - Resume Optimization\n\n' +
        '**Job Posting:** https://jobs.example.com/1\n' +
        '**Timestamp:** 20250128_120000\n\n' +
        '### Changes Made:\n- Added metrics\n\n---\n'
    )
  })

  it('appends to existing content without escaping', async () => {
    await fs.writeFile(changelogPath, '# Existing\n')

    await new ChangelogService(changelogPath, NOW).appendOptimization({
      jobUrl: 'https://jobs.example.com/search?q=a&b=c',
      company: 'Smith & Sons',
      timestamp: '20250128_120000',
      changes: '- Reworded <summary>'
    })

    const text = await fs.readFile(changelogPath, 'utf-8')
    expect(text.startsWith('# Existing\n\n## 2025-01-28 - Resume Optimization\n')).toBe(true)
    expect(text).toContain('**Job Posting:** https://jobs.example.com/search?q=a&b=c\n**Company:** Smith & Sons\n')
    expect(text).toContain('- Reworded <summary>')
  })

  it('records promotions with an optional reason', async () => {
    const service = new ChangelogService(changelogPath, NOW)
    await fs.writeFile(changelogPath, '')

    await service.appendPromotion({
      source: 'resume_optimized_20250128_120000.md',
      backup: 'resume_backup_20250128_120500.md',
      reason: 'Incorporated feedback'
    })

    expect(await fs.readFile(changelogPath, 'utf-8')).toBe(
      [
        '',
        '## 2025-01-28 - Promoted Optimized Resume to Baseline',
        '',
        '**Source:** resume_optimized_20250128_120000.md',
        '**Backup:** resume_backup_20250128_120500.md',
        '**Reason:** Incorporated feedback',
        '',
        'The optimized resume has been promoted to be the new baseline resume.',
        'All future optimizations will be based on this version.',
        '',
        '---',
        ''
      ].join('\n')
    )
  })
})
