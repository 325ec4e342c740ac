import { getResumeConfig } from '../config/resume-config'
import { BuildService } from '../modules/build/build.service'
import { runCommand } from './cli-args'

runCommand({ usage: 'build-pdf' }, async () => {
  const config = await getResumeConfig()
  const build = new BuildService(config)
  const output = await build.writePdf(config.path('resume_source'), build.baselinePdfPath())
  console.log(`✓ Wrote ${output}`)
})
