import type { ActiveTask, MessageRef, WorkerSignal } from '@leash/shared'
import { ulid } from 'ulid'
import { isPidAlive, terminatePid } from '@/lease/process-control'
import { logger } from '@/logger'
import { combineTasks, pickNextTask } from '@/router/task-router'
import type { Runtime } from '@/runtime'
import {
  SUPERVISOR_PROCESS,
  SUPERVISOR_STATE,
  WORKER_STATUS,
  watcherProcessKey,
} from '@/store/state-keys'
import type { StateKey } from '@/store/state-store'
import type { ProcessRecord } from '@/store/state-keys'

// ---------- Sending ----------

export interface SendInput {
  channelId: string
  chatId: string
  text: string
  senderId?: string
  replyToMessageId?: string
}

/** Append a locally authored inbound message. Returns its message id. */
export function sendMessage(runtime: Runtime, input: SendInput): string {
  if (!runtime.transports.has(input.channelId)) {
    throw new Error(`Unknown channel: ${input.channelId}`)
  }
  const messageId = `cli-${ulid()}`
  runtime.messages.append({
    channelId: input.channelId,
    messageId,
    chatId: input.chatId,
    senderId: input.senderId ?? 'cli',
    text: input.text,
    receivedAt: new Date(),
    replyToMessageId: input.replyToMessageId ?? null,
  })
  return messageId
}

// ---------- Worker side ----------

async function assertLeaseHolder(runtime: Runtime, sessionId: string): Promise<void> {
  const record = await runtime.lease.current()
  if (!record || record.sessionId !== sessionId) {
    throw new Error(`Session ${sessionId} does not hold the lease`)
  }
}

/** Leave a done/waiting signal for the supervisor's next cycle. */
export async function writeWorkerSignal(runtime: Runtime, signal: WorkerSignal): Promise<void> {
  await assertLeaseHolder(runtime, signal.sessionId)
  if (signal.kind === 'waiting' && !signal.awaitingReplyTo && !signal.question) {
    throw new Error('A waiting signal needs a reply target or a question')
  }
  await runtime.stateStore.write(WORKER_STATUS, signal)
  logger.info({ sessionId: signal.sessionId, kind: signal.kind }, 'worker_signal_written')
}

export async function heartbeat(runtime: Runtime, sessionId: string): Promise<boolean> {
  return runtime.lease.heartbeat(sessionId)
}

export interface ClaimedWork {
  sessionId: string
  chatId: string
  channelId: string
  instruction: string
  sourceMessageIds: MessageRef[]
}

/**
 * Standby worker asks for more work. The current task counts as finished;
 * everything queued is merged into one new active task. Resolves null when
 * nothing is waiting.
 */
export async function claimNext(runtime: Runtime, sessionId: string): Promise<ClaimedWork | null> {
  const { markers, messages, matcher, config } = runtime
  await assertLeaseHolder(runtime, sessionId)

  const current = await markers.currentTask()
  if (current && current.sessionId !== sessionId) {
    throw new Error(`Active task belongs to session ${current.sessionId}`)
  }
  if (current) {
    messages.markProcessed(current.sourceMessageIds)
  }

  const pick = pickNextTask(
    messages.listUnprocessed().filter((m) => !matcher.matches(m.text)),
    messages.listWaiting(),
    { replyMatching: config.router.replyMatching },
  )
  const combined = combineTasks(pick.task ? [pick.task, ...pick.remaining] : [])
  if (!combined) {
    if (current) await markers.finishTask(sessionId)
    return null
  }

  const task: ActiveTask = {
    sessionId,
    instruction: combined.instruction,
    chatId: combined.chatId,
    channelId: combined.channelId,
    sourceMessageIds: combined.sourceMessageIds,
    startedAt: new Date().toISOString(),
  }
  await markers.beginTask(task)
  for (const waiting of combined.waitingTasks) {
    messages.removeWaiting(waiting.taskId)
  }
  messages.markSeen(task.sourceMessageIds)
  await runtime.lease.heartbeat(sessionId)

  logger.info(
    { sessionId, chatId: task.chatId, messages: task.sourceMessageIds.length },
    'standby_task_claimed',
  )
  return {
    sessionId,
    chatId: task.chatId,
    channelId: task.channelId,
    instruction: task.instruction,
    sourceMessageIds: task.sourceMessageIds,
  }
}

// ---------- Process records ----------

export async function registerProcess(
  runtime: Runtime,
  key: StateKey<ProcessRecord>,
  extra: Omit<ProcessRecord, 'pid' | 'startedAt'> = {},
): Promise<void> {
  const existing = await runtime.stateStore.get(key)
  if (existing && existing.pid !== process.pid && isPidAlive(existing.pid)) {
    throw new Error(`Already running with pid ${existing.pid}`)
  }
  await runtime.stateStore.write(key, {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    ...extra,
  })
}

/** Remove the record only if it still names this process. */
export async function unregisterProcess(
  runtime: Runtime,
  key: StateKey<ProcessRecord>,
): Promise<void> {
  const existing = await runtime.stateStore.read(key)
  if (existing && existing.value.pid === process.pid) {
    await runtime.stateStore.compareAndSwap(key, existing.revision, null)
  }
}

// ---------- Stop ----------

export type ProcessStopResult = 'stopped' | 'not_running' | 'unkillable'

export interface StopReport {
  supervisor: ProcessStopResult
  watchers: Record<string, ProcessStopResult>
  workerStopped: boolean
  interruptedInstruction: string | null
}

async function stopRecordedProcess(
  runtime: Runtime,
  key: StateKey<ProcessRecord>,
): Promise<ProcessStopResult> {
  const record = await runtime.stateStore.get(key)
  if (!record || record.pid === process.pid || !isPidAlive(record.pid)) {
    await runtime.stateStore.delete(key)
    return 'not_running'
  }
  const gone = await terminatePid(record.pid, runtime.config.lease.killGraceMs)
  if (!gone) return 'unkillable'
  await runtime.stateStore.delete(key)
  return 'stopped'
}

/**
 * Stop the supervisor and watcher processes, terminate the worker and
 * clear lease state. An aborted task is recorded as an interrupt.
 */
export async function stopAll(runtime: Runtime, reason = 'operator stop'): Promise<StopReport> {
  const { stateStore, markers, lease, messages } = runtime

  const supervisor = await stopRecordedProcess(runtime, SUPERVISOR_PROCESS)
  const watchers: Record<string, ProcessStopResult> = {}
  for (const channel of runtime.config.channels) {
    watchers[channel.id] = await stopRecordedProcess(runtime, watcherProcessKey(channel.id))
  }

  const task = await markers.takeTask()
  if (task) messages.markProcessed(task.sourceMessageIds)
  const workerStopped = await lease.forceClear()
  if (!workerStopped) {
    if (task) await markers.beginTask(task)
  } else if (task) {
    await markers.recordInterrupt(task, reason)
  }

  await stateStore.delete(WORKER_STATUS)
  await stateStore.write(SUPERVISOR_STATE, {
    state: 'IDLE',
    pid: process.pid,
    at: new Date().toISOString(),
  })

  const report: StopReport = {
    supervisor,
    watchers,
    workerStopped,
    interruptedInstruction: workerStopped && task ? task.instruction : null,
  }
  logger.info(report, 'leash_stopped')
  return report
}
