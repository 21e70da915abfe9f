import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createFakeProcess, FakeProcess } from './helpers/fake-process.js'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { isProcessTimeoutError, runProcess, runProcessCapture } from '../src/slides/tools.js'

const baseArgs = { command: 'tool', args: ['--flag'], timeoutMs: 1_000, errorLabel: 'tool' }

describe('runProcess', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('splits stdout and stderr into lines across chunks', async () => {
    const proc = new FakeProcess()
    spawnMock.mockReturnValue(proc)
    const stdoutLines: string[] = []
    const stderrLines: string[] = []

    const done = runProcess({
      ...baseArgs,
      onStdoutLine: (line) => stdoutLines.push(line),
      onStderrLine: (line) => stderrLines.push(line),
    })
    proc.stdout.emit('data', Buffer.from('progress:1|10\nprogr'))
    proc.stdout.emit('data', Buffer.from('ess:5|10\r\n\nprogress:10|10'))
    proc.stderr.emit('data', Buffer.from('frame=1\nframe='))
    proc.stderr.emit('data', Buffer.from('2'))
    proc.emit('close', 0)
    await done

    expect(stdoutLines).toEqual(['progress:1|10', 'progress:5|10', 'progress:10|10'])
    expect(stderrLines).toEqual(['frame=1', 'frame=2'])
    expect(spawnMock).toHaveBeenCalledWith('tool', ['--flag'], {
      stdio: ['ignore', 'pipe', 'pipe'],
    })
  })

  it('rejects with the exit code and stderr', async () => {
    spawnMock.mockReturnValue(createFakeProcess({ stderr: 'first\nsecond\n', code: 2 }))

    await expect(runProcess(baseArgs)).rejects.toThrow('tool exited with code 2: first\nsecond')
  })

  it('kills the process once the timeout passes', async () => {
    const proc = createFakeProcess({ hang: true })
    spawnMock.mockReturnValue(proc)

    const error: unknown = await runProcess({ ...baseArgs, timeoutMs: 5 }).catch(
      (caught: unknown) => caught
    )

    expect(isProcessTimeoutError(error)).toBe(true)
    expect(error).toHaveProperty('message', 'tool timed out after 5ms')
    expect(proc.signals).toEqual(['SIGKILL'])
  })
})

describe('runProcessCapture', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('returns stdout as bytes', async () => {
    spawnMock.mockReturnValue(createFakeProcess({ stdout: Buffer.from([0, 128, 255]) }))

    const output = await runProcessCapture(baseArgs)

    expect([...output]).toEqual([0, 128, 255])
  })

  it('rejects when the tool cannot be started', async () => {
    const proc = new FakeProcess()
    spawnMock.mockReturnValue(proc)

    const done = runProcessCapture(baseArgs)
    proc.emit('error', new Error('spawn tool ENOENT'))

    await expect(done).rejects.toThrow('spawn tool ENOENT')
  })
})
