/**
 * Test helpers: temp data dirs, runtimes wired to real `node -e` workers,
 * message fixtures and polling.
 */
import { spawnSync } from 'node:child_process'
import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { WorkerInput } from '@leash/shared'
import { afterEach } from 'vitest'
import type { OutboundRecord } from '@/channels/types'
import { defineConfig, type LeashConfigInput } from '@/config'
import { type DataPaths, dataPaths } from '@/root'
import { createRuntime, type Runtime, type RuntimeOptions } from '@/runtime'
import {
  type LaunchedWorker,
  type Launcher,
  WorkerLauncher,
} from '@/supervisor/worker-launcher'

// ---------- Worker scripts ----------

export const WORKER_SCRIPTS = {
  /** Runs until killed */
  idle: 'setTimeout(() => {}, 60000)',
  /** Ignores SIGTERM, so only SIGKILL stops it */
  stubborn: "process.on('SIGTERM', () => {}); setTimeout(() => {}, 60000)",
  crash: 'process.exit(3)',
  clean: 'process.exit(0)',
} as const

export function workerConfig(script: string): LeashConfigInput['worker'] {
  return { command: process.execPath, args: ['-e', script] }
}

// ---------- Temp dirs & runtimes ----------

const cleanups: Array<() => Promise<void>> = []

afterEach(async () => {
  while (cleanups.length > 0) {
    const cleanup = cleanups.pop()
    if (cleanup) await cleanup()
  }
})

export function makeTempDir(prefix = 'leash-'): string {
  const dir = mkdtempSync(join(tmpdir(), prefix))
  cleanups.push(async () => {
    rmSync(dir, { recursive: true, force: true })
  })
  return dir
}

export function testConfig(overrides: LeashConfigInput = {}) {
  return defineConfig({
    pollIntervalMs: 50,
    channels: [
      { id: 'local', transport: 'spool' },
      { id: 'web', transport: 'http' },
    ],
    status: { enabled: false },
    mirror: { pollIntervalMs: 50, restartDelayMs: 50 },
    worker: workerConfig(WORKER_SCRIPTS.idle),
    ...overrides,
    lease: { killGraceMs: 500, ...overrides.lease },
  })
}

/** Runtime on a fresh data dir; workers are killed after the test. */
export async function createTestRuntime(
  options: { config?: LeashConfigInput; paths?: DataPaths } & Partial<
    Omit<RuntimeOptions, 'config' | 'paths'>
  > = {},
): Promise<Runtime> {
  const { config, paths, ...rest } = options
  const runtime = await createRuntime({
    config: testConfig(config),
    paths: paths ?? dataPaths(makeTempDir()),
    mirrorOutput: false,
    ...rest,
  })
  // registered after the temp dir so it runs before the dir is removed
  cleanups.push(() => runtime.close({ killWorkers: true }))
  return runtime
}

// ---------- Launchers ----------

/**
 * Real launcher that runs `scripts[n]` for the n-th launch (the last
 * script repeats) and records every input.
 */
export class ScriptedLauncher implements Launcher {
  readonly inputs: WorkerInput[] = []

  constructor(
    private readonly paths: DataPaths,
    private readonly scripts: readonly string[],
  ) {}

  async launch(input: WorkerInput): Promise<LaunchedWorker> {
    const index = Math.min(this.inputs.length, this.scripts.length - 1)
    this.inputs.push(input)
    const script = this.scripts[index] ?? WORKER_SCRIPTS.idle
    return new WorkerLauncher(testConfig({ worker: workerConfig(script) }).worker, this.paths).launch(
      input,
    )
  }
}

// ---------- Messages ----------

let messageSeq = 0

export interface InboundFixture {
  text: string
  chatId?: string
  channelId?: string
  messageId?: string
  replyTo?: string
  at?: Date
}

/** Append an inbound message; returns its message id. */
export function inbound(runtime: Runtime, fixture: InboundFixture): string {
  messageSeq++
  const messageId = fixture.messageId ?? `m-${messageSeq}`
  runtime.messages.append({
    channelId: fixture.channelId ?? 'local',
    messageId,
    chatId: fixture.chatId ?? 'chat-1',
    senderId: 'user-1',
    text: fixture.text,
    receivedAt: fixture.at ?? new Date(Date.now() + messageSeq),
    replyToMessageId: fixture.replyTo ?? null,
  })
  return messageId
}

/** Notices the spool channel sent, oldest first. */
export function readOutbox(paths: DataPaths, channelId = 'local'): OutboundRecord[] {
  const dir = join(paths.spoolDir, channelId, 'outbox')
  let files: string[]
  try {
    files = readdirSync(dir)
      .filter((f) => f.endsWith('.json'))
      .sort()
  } catch {
    return []
  }
  return files.map((f) => JSON.parse(readFileSync(join(dir, f), 'utf8')) as OutboundRecord)
}

// ---------- Processes ----------

/** Pid of a process that has already exited. */
export function deadPid(): number {
  const result = spawnSync(process.execPath, ['-e', ''])
  if (result.pid === undefined) throw new Error('spawnSync returned no pid')
  return result.pid
}

export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  timeoutMs = 10_000,
  intervalMs = 25,
): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (Date.now() < deadline) {
    if (await predicate()) return
    await new Promise((resolve) => setTimeout(resolve, intervalMs))
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`)
}
