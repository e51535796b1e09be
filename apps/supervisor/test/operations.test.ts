import { describe, expect, test } from 'vitest'
import {
  claimNext,
  registerProcess,
  sendMessage,
  stopAll,
  unregisterProcess,
  writeWorkerSignal,
} from '@/operations'
import { dataPaths } from '@/root'
import { SUPERVISOR_PROCESS, SUPERVISOR_STATE, WORKER_STATUS } from '@/store/state-keys'
import {
  createTestRuntime,
  deadPid,
  inbound,
  makeTempDir,
  ScriptedLauncher,
  WORKER_SCRIPTS,
} from './helpers'

describe('sendMessage', () => {
  test('appends a local message to a configured channel', async () => {
    const runtime = await createTestRuntime()

    const id = sendMessage(runtime, { channelId: 'local', chatId: 'chat-1', text: 'run lint' })

    expect(id.startsWith('cli-')).toBe(true)
    expect(runtime.messages.get({ channelId: 'local', messageId: id })).toMatchObject({
      chatId: 'chat-1',
      senderId: 'cli',
      text: 'run lint',
      processed: false,
    })
  })

  test('rejects unknown channels', async () => {
    const runtime = await createTestRuntime()
    expect(() => sendMessage(runtime, { channelId: 'nope', chatId: 'c', text: 'x' })).toThrow(
      'Unknown channel: nope',
    )
  })
})

describe('writeWorkerSignal', () => {
  test('requires the caller to hold the lease', async () => {
    const runtime = await createTestRuntime()
    await expect(
      writeWorkerSignal(runtime, { sessionId: 's-x', kind: 'done', at: '2026-03-01T10:00:00Z' }),
    ).rejects.toThrow('Session s-x does not hold the lease')
  })

  test('a waiting signal needs a reply target or a question', async () => {
    const runtime = await createTestRuntime()
    await runtime.lease.tryAcquire('s-1')

    await expect(
      writeWorkerSignal(runtime, { sessionId: 's-1', kind: 'waiting', at: '2026-03-01T10:00:00Z' }),
    ).rejects.toThrow('A waiting signal needs a reply target or a question')

    const signal = {
      sessionId: 's-1',
      kind: 'waiting',
      question: 'Which branch?',
      at: '2026-03-01T10:00:00Z',
    } as const
    await writeWorkerSignal(runtime, signal)
    expect(await runtime.stateStore.get(WORKER_STATUS)).toEqual(signal)
  })
})

describe('claimNext', () => {
  test('finishes the current task and hands over the queued messages', async () => {
    const runtime = await createTestRuntime()
    await runtime.lease.tryAcquire('s-1')
    inbound(runtime, { text: 'first task', messageId: 'm-1' })
    await runtime.markers.beginTask({
      sessionId: 's-1',
      instruction: 'first task',
      chatId: 'chat-1',
      channelId: 'local',
      sourceMessageIds: [{ channelId: 'local', messageId: 'm-1' }],
      startedAt: '2026-03-01T10:00:00.000Z',
    })
    inbound(runtime, { text: 'next thing', messageId: 'm-2' })
    inbound(runtime, { text: 'stop', messageId: 'm-3' })

    const claimed = await claimNext(runtime, 's-1')

    expect(claimed).toEqual({
      sessionId: 's-1',
      chatId: 'chat-1',
      channelId: 'local',
      instruction: 'next thing',
      sourceMessageIds: [{ channelId: 'local', messageId: 'm-2' }],
    })
    expect(runtime.messages.get({ channelId: 'local', messageId: 'm-1' })?.processed).toBe(true)
    expect(runtime.messages.get({ channelId: 'local', messageId: 'm-2' })?.seenAt).not.toBeNull()
    expect((await runtime.markers.currentTask())?.instruction).toBe('next thing')

    // interrupt keywords are left to the supervisor
    expect(await claimNext(runtime, 's-1')).toBeNull()
    expect(await runtime.markers.currentTask()).toBeNull()
    expect(runtime.messages.listUnprocessed().map((m) => m.messageId)).toEqual(['m-3'])
  })

  test('only the lease holder can claim', async () => {
    const runtime = await createTestRuntime()
    await runtime.lease.tryAcquire('s-1')
    await expect(claimNext(runtime, 's-2')).rejects.toThrow('Session s-2 does not hold the lease')
  })
})

describe('process records', () => {
  test('register and unregister this process', async () => {
    const runtime = await createTestRuntime()

    await registerProcess(runtime, SUPERVISOR_PROCESS, { host: '127.0.0.1', port: 7878 })
    expect(await runtime.stateStore.get(SUPERVISOR_PROCESS)).toMatchObject({
      pid: process.pid,
      host: '127.0.0.1',
      port: 7878,
    })

    await unregisterProcess(runtime, SUPERVISOR_PROCESS)
    expect(await runtime.stateStore.get(SUPERVISOR_PROCESS)).toBeNull()
  })

  test('refuses to register over another live process', async () => {
    const runtime = await createTestRuntime()
    const record = { pid: process.ppid, startedAt: '2026-03-01T10:00:00.000Z' }
    await runtime.stateStore.write(SUPERVISOR_PROCESS, record)

    await expect(registerProcess(runtime, SUPERVISOR_PROCESS)).rejects.toThrow(
      `Already running with pid ${process.ppid}`,
    )
    // unregister leaves records of other processes alone
    await unregisterProcess(runtime, SUPERVISOR_PROCESS)
    expect(await runtime.stateStore.get(SUPERVISOR_PROCESS)).toEqual(record)
  })

  test('replaces the record of a dead process', async () => {
    const runtime = await createTestRuntime()
    await runtime.stateStore.write(SUPERVISOR_PROCESS, {
      pid: deadPid(),
      startedAt: '2026-03-01T10:00:00.000Z',
    })

    await registerProcess(runtime, SUPERVISOR_PROCESS)
    expect((await runtime.stateStore.get(SUPERVISOR_PROCESS))?.pid).toBe(process.pid)
  })
})

describe('stopAll', () => {
  test('stops the worker and records the aborted task', async () => {
    const paths = dataPaths(makeTempDir())
    const runtime = await createTestRuntime({
      paths,
      launcher: new ScriptedLauncher(paths, [WORKER_SCRIPTS.idle]),
    })
    inbound(runtime, { text: 'long task' })
    await runtime.supervisor.runCycle()

    const report = await stopAll(runtime)

    expect(report).toEqual({
      supervisor: 'not_running',
      watchers: { local: 'not_running', web: 'not_running' },
      workerStopped: true,
      interruptedInstruction: 'long task',
    })
    expect(await runtime.lease.current()).toBeNull()
    expect(await runtime.markers.currentTask()).toBeNull()
    expect(await runtime.markers.last()).toMatchObject({
      kind: 'interrupt',
      previousInstruction: 'long task',
      reason: 'operator stop',
    })
    expect(runtime.messages.listUnprocessed()).toEqual([])
    expect((await runtime.stateStore.get(SUPERVISOR_STATE))?.state).toBe('IDLE')
  })

  test('with nothing running only resets state', async () => {
    const runtime = await createTestRuntime()
    const report = await stopAll(runtime)
    expect(report.workerStopped).toBe(true)
    expect(report.interruptedInstruction).toBeNull()
    expect(await runtime.markers.last()).toBeNull()
  })
})
