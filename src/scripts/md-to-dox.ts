import { getResumeConfig } from '../config/resume-config'
import { BuildService } from '../modules/build/build.service'
import { runCommand } from './cli-args'

runCommand({ usage: 'md-to-dox' }, async () => {
  const config = await getResumeConfig()
  const source = config.path('resume_source')
  const output = await new BuildService(config).writeDox(source, config.path('resume_dox'))
  console.log(`✓ Converted ${source} -> ${output}`)
})
