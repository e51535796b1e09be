import type { ActiveTask } from '@leash/shared'
import { describe, expect, test } from 'vitest'
import { MarkerRecorder } from '@/markers/recorder'
import { FileStateStore } from '@/store/state-store'
import { makeTempDir } from './helpers'

const NOW = new Date('2026-03-01T10:00:00.000Z')

const TASK: ActiveTask = {
  sessionId: 's1',
  instruction: 'rename the config loader',
  chatId: 'chat-1',
  channelId: 'local',
  sourceMessageIds: [
    { channelId: 'local', messageId: 'm-1' },
    { channelId: 'local', messageId: 'm-2' },
  ],
  startedAt: '2026-03-01T09:58:00.000Z',
}

function createRecorder() {
  return new MarkerRecorder(new FileStateStore(makeTempDir('leash-markers-')), () => NOW)
}

describe('MarkerRecorder', () => {
  test('beginTask and currentTask round-trip the active task', async () => {
    const markers = createRecorder()
    await markers.beginTask(TASK)
    expect(await markers.currentTask()).toEqual(TASK)
  })

  test('recordCrash derives the marker from the task', async () => {
    const markers = createRecorder()
    const marker = await markers.recordCrash(TASK)
    expect(marker).toEqual({
      kind: 'crash',
      instruction: 'rename the config loader',
      sourceMessageIds: TASK.sourceMessageIds,
      chatId: 'chat-1',
      channelId: 'local',
      startedAt: '2026-03-01T09:58:00.000Z',
      detectedAt: '2026-03-01T10:00:00.000Z',
    })
    expect(await markers.peekCrash()).toEqual(marker)
    expect(await markers.last()).toEqual(marker)
  })

  test('recordInterrupt keeps the previous instruction and reason', async () => {
    const markers = createRecorder()
    const marker = await markers.recordInterrupt(TASK, 'user: stop')
    expect(marker).toEqual({
      kind: 'interrupt',
      previousInstruction: 'rename the config loader',
      previousMessageIds: TASK.sourceMessageIds,
      chatId: 'chat-1',
      channelId: 'local',
      reason: 'user: stop',
      interruptedAt: '2026-03-01T10:00:00.000Z',
    })
    expect(await markers.peekInterrupt()).toEqual(marker)
  })

  test('markers are consumed once and the last marker survives', async () => {
    const markers = createRecorder()
    const marker = await markers.recordCrash(TASK)

    expect(await markers.consumeCrash()).toEqual(marker)
    expect(await markers.consumeCrash()).toBeNull()
    expect(await markers.peekCrash()).toBeNull()
    expect(await markers.last()).toEqual(marker)
  })

  test('racing crash and interrupt paths yield exactly one marker', async () => {
    const markers = createRecorder()
    await markers.beginTask(TASK)

    const crashPath = async () => {
      const task = await markers.takeTask()
      return task ? markers.recordCrash(task) : null
    }
    const interruptPath = async () => {
      const task = await markers.takeTask()
      return task ? markers.recordInterrupt(task, 'user: stop') : null
    }

    const results = await Promise.all([crashPath(), interruptPath(), crashPath()])
    expect(results.filter((m) => m !== null)).toHaveLength(1)

    const crash = await markers.peekCrash()
    const interrupt = await markers.peekInterrupt()
    expect([crash, interrupt].filter((m) => m !== null)).toHaveLength(1)
    expect(await markers.currentTask()).toBeNull()
  })

  test('finishTask only removes the task of the given session', async () => {
    const markers = createRecorder()
    await markers.beginTask(TASK)

    expect(await markers.finishTask('other')).toBeNull()
    expect(await markers.currentTask()).toEqual(TASK)

    expect(await markers.finishTask('s1')).toEqual(TASK)
    expect(await markers.currentTask()).toBeNull()
  })
})
