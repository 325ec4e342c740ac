import path from 'node:path'
import { getResumeConfig } from '../config/resume-config'
import { BuildService } from '../modules/build/build.service'
import { runCommand } from './cli-args'

runCommand(
  {
    usage: 'build-optimized <resume_md> [--company NAME]',
    positionals: [{ name: 'resumeMd', required: true }],
    options: {
      company: { alias: 'c', type: 'string', description: 'Company name (for output file naming)' }
    }
  },
  async (args) => {
    const source = path.resolve(args.positionals.resumeMd ?? '')
    const config = await getResumeConfig()

    console.log(`📄 Building outputs from: ${source}`)
    const outputs = await new BuildService(config).buildOptimized(source, { company: args.values.company })
    console.log(`  ✓ DOX: ${outputs.dox}`)
    console.log(`  ✓ DOCX: ${outputs.docx}`)
    console.log(`  ✓ PDF: ${outputs.pdf}`)
    console.log('\n✅ Build complete!')
  }
)
