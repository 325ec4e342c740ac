import { spawn } from 'node:child_process'
import { logger } from '../../logger'
import { env } from '../../config/env'
import { DoxygenError } from '../../errors'

const STDERR_TAIL_CHARS = 800

export interface DoxygenRunOptions {
  /** Directory Doxygen resolves INPUT and OUTPUT_DIRECTORY against */
  cwd: string
  bin?: string
}

/**
 * Run Doxygen on a Doxyfile and resolve with its stdout.
 */
export function runDoxygen(doxyfile: string, options: DoxygenRunOptions): Promise<string> {
  const bin = options.bin ?? env.DOXYGEN_BIN

  return new Promise((resolve, reject) => {
    logger.info({ bin, doxyfile }, 'Running doxygen')

    const child = spawn(bin, [doxyfile], {
      cwd: options.cwd,
      env: process.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe']
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return
      settled = true
      if (error.code === 'ENOENT') {
        reject(
          new DoxygenError(
            'not_found',
            `Doxygen executable '${bin}' not found. Install doxygen or set DOXYGEN_BIN.`
          )
        )
        return
      }
      reject(new DoxygenError('failed', `Doxygen could not start: ${error.message}`))
    })

    child.on('close', (code) => {
      if (settled) return
      settled = true
      if (code === 0) {
        resolve(stdout)
        return
      }
      const tail = stderr.trim().slice(-STDERR_TAIL_CHARS)
      logger.warn({ code, stderr: tail }, 'Doxygen failed')
      reject(new DoxygenError('failed', `Doxygen exited with code ${code}${tail ? `:\n${tail}` : ''}`))
    })
  })
}
