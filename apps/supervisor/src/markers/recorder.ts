import type { ActiveTask, CrashMarker, InterruptMarker, Marker } from '@leash/shared'
import { logger } from '@/logger'
import {
  ACTIVE_TASK,
  CRASH_MARKER,
  INTERRUPT_MARKER,
  LAST_MARKER,
} from '@/store/state-keys'
import type { FileStateStore } from '@/store/state-store'

/**
 * Durable record of why the previous worker session ended, plus the
 * ActiveTask record those markers are derived from.
 *
 * The crash and interrupt paths both start by taking the ActiveTask
 * destructively (`takeTask`); only the caller that received it records a
 * marker, so a terminated task yields exactly one of the two.
 */
export class MarkerRecorder {
  constructor(
    private readonly store: FileStateStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  // ---- Active task ----

  async beginTask(task: ActiveTask): Promise<void> {
    await this.store.write(ACTIVE_TASK, task)
  }

  async currentTask(): Promise<ActiveTask | null> {
    return this.store.get(ACTIVE_TASK)
  }

  /** Destructive read of the ActiveTask record. */
  async takeTask(): Promise<ActiveTask | null> {
    return this.store.take(ACTIVE_TASK)
  }

  /** Worker finished the task; returns the removed record if it belonged to `sessionId`. */
  async finishTask(sessionId: string): Promise<ActiveTask | null> {
    const current = await this.store.read(ACTIVE_TASK)
    if (!current || current.value.sessionId !== sessionId) return null
    const removed = await this.store.compareAndSwap(ACTIVE_TASK, current.revision, null)
    return removed ? current.value : null
  }

  // ---- Recording ----

  async recordCrash(task: ActiveTask): Promise<CrashMarker> {
    const marker: CrashMarker = {
      kind: 'crash',
      instruction: task.instruction,
      sourceMessageIds: task.sourceMessageIds,
      chatId: task.chatId,
      channelId: task.channelId,
      startedAt: task.startedAt,
      detectedAt: this.now().toISOString(),
    }
    await this.store.write(CRASH_MARKER, marker)
    await this.store.write(LAST_MARKER, marker)
    logger.warn(
      { sessionId: task.sessionId, chatId: task.chatId, messages: task.sourceMessageIds.length },
      'crash_marker_recorded',
    )
    return marker
  }

  async recordInterrupt(task: ActiveTask, reason: string): Promise<InterruptMarker> {
    const marker: InterruptMarker = {
      kind: 'interrupt',
      previousInstruction: task.instruction,
      previousMessageIds: task.sourceMessageIds,
      chatId: task.chatId,
      channelId: task.channelId,
      reason,
      interruptedAt: this.now().toISOString(),
    }
    await this.store.write(INTERRUPT_MARKER, marker)
    await this.store.write(LAST_MARKER, marker)
    logger.info({ sessionId: task.sessionId, chatId: task.chatId, reason }, 'interrupt_marker_recorded')
    return marker
  }

  // ---- Consumption ----

  async consumeCrash(): Promise<CrashMarker | null> {
    return this.store.take(CRASH_MARKER)
  }

  async consumeInterrupt(): Promise<InterruptMarker | null> {
    return this.store.take(INTERRUPT_MARKER)
  }

  async peekCrash(): Promise<CrashMarker | null> {
    return this.store.get(CRASH_MARKER)
  }

  async peekInterrupt(): Promise<InterruptMarker | null> {
    return this.store.get(INTERRUPT_MARKER)
  }

  /** Most recent marker of either kind, kept after consumption for status reporting. */
  async last(): Promise<Marker | null> {
    return this.store.get(LAST_MARKER)
  }
}
