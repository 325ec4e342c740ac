import { getResumeConfig } from '../config/resume-config'
import { BuildService } from '../modules/build/build.service'
import { runCommand } from './cli-args'

runCommand({ usage: 'build-html' }, async () => {
  const config = await getResumeConfig()
  const index = await new BuildService(config).buildHtml()
  console.log(`✓ HTML generated at ${index}`)
})
