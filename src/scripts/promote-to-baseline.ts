import path from 'node:path'
import { getResumeConfig } from '../config/resume-config'
import { PromotionService, type PromotionProgressEvent } from '../modules/baseline/promotion.service'
import { runCommand } from './cli-args'

function report(event: PromotionProgressEvent): void {
  switch (event.stage) {
    case 'backup':
      console.log(`📦 Backed up current baseline to: ${event.path}`)
      break
    case 'promoted':
      console.log(`✨ Promoted optimized resume to baseline: ${event.path}`)
      break
    case 'changelog':
      console.log(`✓ Updated changelog: ${event.path}`)
      console.log('\n🔄 Regenerating baseline outputs...')
      break
    case 'built':
      console.log(`  ✓ ${event.result.step.toUpperCase()}: ${event.result.path}`)
      break
    case 'restored':
      console.error(`\n⚠️  Error occurred, restored previous baseline: ${event.path}`)
      break
  }
}

runCommand(
  {
    usage: 'promote-to-baseline <optimized_md> [--reason TEXT]',
    positionals: [{ name: 'optimizedMd', required: true }],
    options: {
      reason: { alias: 'r', type: 'string', description: 'Why this version becomes the baseline' }
    }
  },
  async (args) => {
    const source = path.resolve(args.positionals.optimizedMd ?? '')
    const config = await getResumeConfig()

    console.log(`📄 Reading optimized resume: ${source}`)
    const result = await new PromotionService(config, { onProgress: report }).promote(source, {
      reason: args.values.reason
    })

    console.log('\n✅ Promotion complete!')
    console.log(`   Baseline resume: ${result.baselinePath}`)
    console.log(`   Backup saved: ${result.backupPath ?? '(no previous baseline)'}`)
  }
)
