import { getResumeConfig } from '../config/resume-config'
import { OptimizerService, type OptimizeProgressEvent } from '../modules/optimizer/optimizer.service'
import { runCommand } from './cli-args'

const BANNER = `
    ╔═══════════════════════════════════════════════════════════╗
    ║                     RESUME OPTIMIZER                      ║
    ║       Tailor your resume and cover letter to a job        ║
    ╚═══════════════════════════════════════════════════════════╝
`

function report(event: OptimizeProgressEvent): void {
  switch (event.stage) {
    case 'fetched':
      console.log(`✓ Fetched job description (${event.chars} characters)`)
      console.log('📄 Loading current resume...')
      break
    case 'resume':
      console.log(`✓ Loaded resume (${event.chars} characters)`)
      break
    case 'generating':
      console.log(`🤖 Calling ${event.provider.toUpperCase()} API to optimize resume...`)
      break
    case 'saved':
      if (event.kind === 'resume') {
        console.log('✓ AI optimization complete')
        console.log('💾 Saving outputs...')
        console.log(`✓ Saved optimized resume: ${event.path}`)
      } else if (event.kind === 'cover_letter') {
        console.log(`✓ Saved cover letter: ${event.path}`)
      } else {
        console.log(`✓ Updated changelog: ${event.path}`)
      }
      break
  }
}

runCommand(
  {
    usage: 'optimize-resume <job_url> [--company NAME] [--verbose]',
    positionals: [{ name: 'jobUrl', required: true }],
    options: {
      company: { alias: 'c', type: 'string', description: 'Company name (for file naming)' },
      verbose: { alias: 'v', type: 'boolean', description: 'Show detailed error information' }
    }
  },
  async (args) => {
    console.log(BANNER)
    const jobUrl = args.positionals.jobUrl ?? ''
    const config = await getResumeConfig()

    console.log(`\n🔍 Fetching job description from: ${jobUrl}`)
    const result = await new OptimizerService(config, { onProgress: report }).optimize({
      jobUrl,
      company: args.values.company,
      verbose: args.flags.verbose
    })

    console.log('\n✅ Resume optimization complete!')
    console.log(`\n📝 Review the optimized resume: ${result.resumePath}`)
    console.log(`📧 Review the cover letter: ${result.coverLetterPath}`)
    console.log(`📋 Changelog updated: ${result.changelogPath}`)
    console.log(`\nTo build DOCX/PDF: npm run build:optimized -- ${result.resumePath}`)
  }
)
