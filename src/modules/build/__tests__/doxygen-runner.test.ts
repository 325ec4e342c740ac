import { EventEmitter } from 'node:events'
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { DoxygenError } from '../../../errors'

type FakeChild = EventEmitter & { stdout: EventEmitter; stderr: EventEmitter }

let spawnCalls: { cmd: string; args: string[]; options: { cwd?: string } }[] = []
let script: (child: FakeChild) => void = () => {}

vi.mock('node:child_process', () => ({
  spawn: vi.fn((cmd: string, args: string[], options: { cwd?: string }) => {
    spawnCalls.push({ cmd, args, options })
    const child: FakeChild = Object.assign(new EventEmitter(), {
      stdout: new EventEmitter(),
      stderr: new EventEmitter()
    })
    setTimeout(() => script(child), 0)
    return child
  })
}))

vi.mock('../../../logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}))

const { runDoxygen } = await import('../doxygen-runner')

describe('runDoxygen', () => {
  beforeEach(() => {
    spawnCalls = []
  })

  it('spawns doxygen with the Doxyfile from the project root', async () => {
    script = (child) => {
      child.stdout.emit('data', Buffer.from('Generating docs...\n'))
      child.emit('close', 0)
    }

    await expect(runDoxygen('/work/Doxyfile', { cwd: '/work' })).resolves.toBe('Generating docs...\n')
    expect(spawnCalls).toHaveLength(1)
    expect(spawnCalls[0].cmd).toBe('doxygen')
    expect(spawnCalls[0].args).toEqual(['/work/Doxyfile'])
    expect(spawnCalls[0].options.cwd).toBe('/work')
  })

  it('honours a custom binary', async () => {
    script = (child) => child.emit('close', 0)

    await runDoxygen('Doxyfile', { cwd: '/work', bin: '/opt/doxygen/bin/doxygen' })

    expect(spawnCalls[0].cmd).toBe('/opt/doxygen/bin/doxygen')
  })

  it('reports a missing executable as not_found', async () => {
    script = (child) => child.emit('error', Object.assign(new Error('spawn doxygen ENOENT'), { code: 'ENOENT' }))

    const error = await runDoxygen('Doxyfile', { cwd: '/work' }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(DoxygenError)
    expect(error).toMatchObject({
      reason: 'not_found',
      message: "Doxygen executable 'doxygen' not found. Install doxygen or set DOXYGEN_BIN."
    })
  })

  it('includes stderr when doxygen exits non-zero', async () => {
    script = (child) => {
      child.stderr.emit('data', Buffer.from('error: tag INPUT: file not found\n'))
      child.emit('close', 1)
    }

    await expect(runDoxygen('Doxyfile', { cwd: '/work' })).rejects.toMatchObject({
      reason: 'failed',
      message: 'Doxygen exited with code 1:\nerror: tag INPUT: file not found'
    })
  })
})
