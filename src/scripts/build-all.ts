import { getResumeConfig } from '../config/resume-config'
import { BuildService, type BuildStep } from '../modules/build/build.service'
import { runCommand } from './cli-args'

const STEP_LABELS: Record<BuildStep, string> = {
  dox: 'DOX',
  html: 'HTML',
  docx: 'DOCX',
  pdf: 'PDF'
}

runCommand(
  {
    usage: 'build-all [--skip-html]',
    options: {
      'skip-html': { type: 'boolean', description: 'Skip the Doxygen HTML step' }
    }
  },
  async (args) => {
    const config = await getResumeConfig()
    const build = new BuildService(config)

    console.log(`📄 Building baseline outputs from: ${config.path('resume_source')}`)
    await build.buildBaseline({
      skipHtml: args.flags['skip-html'],
      onStep: ({ step, path }) => console.log(`  ✓ ${STEP_LABELS[step]}: ${path}`)
    })
    console.log(`\n✅ All outputs are in ${config.path('build_dir')}`)
  }
)
