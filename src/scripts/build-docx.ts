import { getResumeConfig } from '../config/resume-config'
import { BuildService } from '../modules/build/build.service'
import { runCommand } from './cli-args'

runCommand({ usage: 'build-docx' }, async () => {
  const config = await getResumeConfig()
  const build = new BuildService(config)
  const output = await build.writeDocx(config.path('resume_source'), build.baselineDocxPath())
  console.log(`✓ Wrote ${output}`)
})
