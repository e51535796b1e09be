import type { ChildProcess } from 'node:child_process'
import { readFileSync } from 'node:fs'
import type { WorkerInput } from '@leash/shared'
import { afterEach, describe, expect, test } from 'vitest'
import { defineConfig } from '@/config'
import { dataPaths } from '@/root'
import { CommandBuilder, substitute } from '@/supervisor/command'
import { safeEnv } from '@/supervisor/safe-env'
import { renderPrompt, WorkerLauncher } from '@/supervisor/worker-launcher'
import { makeTempDir } from './helpers'

const INPUT: WorkerInput = {
  sessionId: 'sess-1',
  task: {
    sessionId: 'sess-1',
    instruction: 'update the docs',
    chatId: 'chat-7',
    channelId: 'local',
    sourceMessageIds: [{ channelId: 'local', messageId: 'm-1' }],
    startedAt: '2026-03-01T10:00:00.000Z',
  },
  remaining: [],
  crash: null,
  interrupt: null,
}

function exited(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve()
  return new Promise((resolve) => child.once('exit', () => resolve()))
}

describe('renderPrompt', () => {
  test('a plain task is the chat header and the instruction', () => {
    expect(renderPrompt(INPUT)).toBe('[chat chat-7]\nupdate the docs')
  })

  test('session context comes before the instruction', () => {
    const prompt = renderPrompt({
      ...INPUT,
      remaining: [{ chatId: 'chat-8', instruction: 'later' }],
      interrupt: {
        kind: 'interrupt',
        previousInstruction: 'old work',
        previousMessageIds: [],
        chatId: 'chat-7',
        channelId: 'local',
        reason: 'user: stop',
        interruptedAt: '2026-03-01T09:59:00.000Z',
      },
    })

    expect(prompt).toBe(
      '[session context]\n' +
        'The user stopped the previous task at 2026-03-01T09:59:00.000Z. ' +
        'Do not continue it unless asked:\nold work\n\n' +
        '1 more task(s) are queued after this one.\n\n' +
        '[chat chat-7]\nupdate the docs',
    )
  })
})

describe('command building', () => {
  test('substitute fills known placeholders only', () => {
    expect(substitute('--session={session} {unknown}', { session: 's1' })).toBe(
      '--session=s1 {unknown}',
    )
  })

  test('splits the base command and appends templated args', () => {
    const parts = CommandBuilder.create('agent --fast')
      .template(['-p', '{prompt}'], { prompt: 'hi there' })
      .env('A', '1')
      .build()
    expect(parts).toEqual({
      program: 'agent',
      args: ['--fast', '-p', 'hi there'],
      env: { A: '1' },
      cwd: undefined,
    })
  })

  test('resolve fails for a program that is not on PATH', async () => {
    await expect(CommandBuilder.create('leash-missing-worker-cmd').resolve()).rejects.toThrow(
      'Worker command not found: leash-missing-worker-cmd',
    )
  })

  test('safeEnv keeps allowlisted variables and the extras', () => {
    const env = safeEnv({ LEASH_SESSION_ID: 's1' }, {
      PATH: '/usr/bin',
      API_SECRET: 'test-secret',
      HOME: '',
    })
    expect(env).toEqual({ PATH: '/usr/bin', LEASH_SESSION_ID: 's1' })
  })
})

describe('WorkerLauncher', () => {
  const savedSecret = process.env.API_SECRET

  afterEach(() => {
    if (savedSecret === undefined) {
      delete process.env.API_SECRET
    } else {
      process.env.API_SECRET = savedSecret
    }
  })

  test('writes the input file and runs the worker with its environment', async () => {
    process.env.API_SECRET = 'test-secret'
    const paths = dataPaths(makeTempDir())
    const script = [
      'console.log(JSON.stringify({',
      '  args: process.argv.slice(1),',
      '  session: process.env.LEASH_SESSION_ID,',
      '  chat: process.env.LEASH_CHAT_ID,',
      '  extra: process.env.EXTRA_FLAG,',
      '  secret: process.env.API_SECRET ?? null,',
      '}))',
    ].join('\n')
    const config = defineConfig({
      worker: {
        command: process.execPath,
        args: ['-e', script, '{session}', '{chat}'],
        env: { EXTRA_FLAG: 'on' },
      },
    })

    const launched = await new WorkerLauncher(config.worker, paths).launch(INPUT)
    await exited(launched.child)

    expect(launched.pid).toBeGreaterThan(0)
    expect(JSON.parse(readFileSync(launched.inputFile, 'utf8'))).toEqual(INPUT)
    const [line] = readFileSync(launched.logFile, 'utf8').trim().split('\n')
    expect(JSON.parse(line ?? '')).toEqual({
      args: ['sess-1', 'chat-7'],
      session: 'sess-1',
      chat: 'chat-7',
      extra: 'on',
      secret: null,
    })
  })

  test('rejects when the command cannot be found', async () => {
    const paths = dataPaths(makeTempDir())
    const config = defineConfig({ worker: { command: 'leash-missing-worker-cmd' } })
    await expect(new WorkerLauncher(config.worker, paths).launch(INPUT)).rejects.toThrow(
      'Worker command not found: leash-missing-worker-cmd',
    )
  })
})
