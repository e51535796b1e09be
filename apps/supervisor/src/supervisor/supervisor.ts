import { join } from 'node:path'
import type {
  ActiveTask,
  ChannelMessage,
  CrashMarker,
  MessageRef,
  SupervisorState,
  WorkerInput,
} from '@leash/shared'
import { ulid } from 'ulid'
import type { Notifier } from '@/channels/notifier'
import type { LeashConfig } from '@/config'
import type { LeaseInspection, LeaseManager, ProcessProbe } from '@/lease/lease-manager'
import { isPidAlive, terminatePid } from '@/lease/process-control'
import { logger } from '@/logger'
import type { MarkerRecorder } from '@/markers/recorder'
import type { DataPaths } from '@/root'
import type { InterruptMatcher } from '@/router/interrupt'
import { type CandidateTask, pickNextTask } from '@/router/task-router'
import type { MessageStore } from '@/store/message-store'
import { SUPERVISOR_STATE, WORKER_STATUS } from '@/store/state-keys'
import type { FileStateStore } from '@/store/state-store'
import { sleep, toErrorMessage } from '@/utils/async'
import { OutputMirror } from './output-mirror'
import type { ManagedEntry, ProcessManager } from './process-manager'
import { type SupervisorAction, transition } from './state'
import type { LaunchedWorker, Launcher } from './worker-launcher'

// ---------- Types ----------

export interface WorkerMeta {
  sessionId: string
  chatId: string
  channelId: string
}

export type CycleAction =
  | 'idle'
  | 'observing'
  | 'deferred'
  | 'completed'
  | 'parked'
  | 'discarded'
  | 'interrupted'
  | 'interrupt_failed'
  | 'recovered'
  | 'stale_cleared'
  | 'recovery_blocked'
  | 'contended'
  | 'launched'
  | 'launch_failed'

export interface CycleResult {
  actions: CycleAction[]
  state: SupervisorState
  sessionId?: string
}

export interface SupervisorDeps {
  config: LeashConfig
  paths: DataPaths
  messages: MessageStore
  stateStore: FileStateStore
  lease: LeaseManager
  markers: MarkerRecorder
  launcher: Launcher
  notifier: Notifier
  processes: ProcessManager<WorkerMeta>
  matcher: InterruptMatcher
  /** Tail worker logs into the structured log (and heartbeat on output). Default: true */
  mirrorOutput?: boolean
  now?: () => Date
}

interface RecoveryResult {
  action?: CycleAction
  /** Lease acquired while recovering, handed on to the launch */
  heldSession?: string
}

export type SupervisorStateHandler = (next: SupervisorState, prev: SupervisorState) => void

export const NOTICES = {
  accepted: 'Got it, working on it.',
  nothingRunning: 'No task is currently running.',
  stopped: (instruction: string) => `Task stopped: ${preview(instruction)}`,
  workerStopped: 'Worker stopped.',
  interruptFailed: 'Could not stop the running task. It is still holding the worker.',
  crashed: (instruction: string) =>
    `The previous task stopped unexpectedly and will be resumed: ${preview(instruction)}`,
  launchFailed: 'Could not start the worker. Will retry.',
  dropped: (attempts: number) => `Giving up on this message after ${attempts} failed attempts.`,
  expired: 'This message expired before it could be handled.',
} as const

const PREVIEW_LENGTH = 80

function preview(text: string): string {
  const line = text.replace(/\s+/g, ' ').trim()
  return line.length > PREVIEW_LENGTH ? `${line.slice(0, PREVIEW_LENGTH - 1)}…` : line
}

function refOf(message: ChannelMessage): MessageRef {
  return { channelId: message.channelId, messageId: message.messageId }
}

function interruptReason(interrupts: readonly ChannelMessage[]): string {
  const [first] = interrupts
  return first ? `user: ${first.text.trim()}` : 'user'
}

/** One notice per chat, replying to the chat's first message. */
function chatsOf(messages: readonly ChannelMessage[]): ChannelMessage[] {
  const seen = new Map<string, ChannelMessage>()
  for (const message of messages) {
    const key = `${message.channelId}\u0000${message.chatId}`
    if (!seen.has(key)) seen.set(key, message)
  }
  return [...seen.values()]
}

/**
 * Probe that routes pids this process spawned through the ProcessManager,
 * so terminations mark the entry cancelled instead of failed.
 */
export function createProcessProbe(processes: ProcessManager<WorkerMeta>): ProcessProbe {
  return {
    isAlive(pid) {
      const entry = processes.findByPid(pid)
      return entry ? processes.isAlive(entry.id) : isPidAlive(pid)
    },
    async terminate(pid, graceMs) {
      const entry = processes.findByPid(pid)
      return entry ? processes.terminate(entry.id, graceMs) : terminatePid(pid, graceMs)
    },
  }
}

// ---------- Supervisor ----------

/**
 * Session state machine. Every poll runs one cycle: apply worker signals,
 * then act on the lease (observe, interrupt, recover) and, when the worker
 * is free, acquire the lease and launch the next task.
 *
 * Cycles, worker exits and any other mutation go through one promise
 * chain, so a process never runs two of them at once.
 */
export class Supervisor {
  private current: SupervisorState = 'IDLE'
  private chain: Promise<unknown> = Promise.resolve()
  private queuedCycle: Promise<CycleResult> | null = null
  private mirrors = new Map<string, OutputMirror>()
  private recoveryFailures = 0
  private stateHandlers = new Set<SupervisorStateHandler>()
  private readonly now: () => Date
  private readonly mirrorOutput: boolean
  private readonly unsubscribeExit: () => void

  constructor(private readonly deps: SupervisorDeps) {
    this.now = deps.now ?? (() => new Date())
    this.mirrorOutput = deps.mirrorOutput ?? true
    this.unsubscribeExit = deps.processes.onExit((entry, code) => {
      this.exclusive(() => this.handleWorkerExit(entry, code)).catch((err: unknown) => {
        logger.error({ sessionId: entry.id, err }, 'worker_exit_handling_failed')
      })
    })
  }

  get state(): SupervisorState {
    return this.current
  }

  onStateChange(handler: SupervisorStateHandler): () => void {
    this.stateHandlers.add(handler)
    return () => {
      this.stateHandlers.delete(handler)
    }
  }

  // ---- Scheduling ----

  /**
   * Run one cycle. Calls made while a cycle is queued share it; calls made
   * while one is running queue exactly one more.
   */
  runCycle(): Promise<CycleResult> {
    if (this.queuedCycle) return this.queuedCycle
    const queued = this.exclusive(async () => {
      this.queuedCycle = null
      try {
        return await this.cycle()
      } catch (err) {
        this.resetAfterFailure()
        throw err
      }
    })
    this.queuedCycle = queued
    return queued
  }

  /** Fire-and-forget cycle, e.g. after a watcher appended messages. */
  requestCycle(): void {
    this.runCycle().catch((err: unknown) => {
      logger.error({ err }, 'supervisor_cycle_failed')
    })
  }

  /** Poll loop. Returns when `signal` aborts; a running worker is left alone. */
  async run(signal: AbortSignal): Promise<void> {
    logger.info({ pollIntervalMs: this.deps.config.pollIntervalMs }, 'supervisor_loop_started')
    while (!signal.aborted) {
      try {
        await this.runCycle()
      } catch (err) {
        logger.error({ err }, 'supervisor_cycle_failed')
      }
      await sleep(this.deps.config.pollIntervalMs, signal)
    }
    await this.stopMirrors()
    logger.info('supervisor_loop_stopped')
  }

  async dispose(): Promise<void> {
    this.unsubscribeExit()
    await this.chain
    await this.stopMirrors()
  }

  /** A cycle that threw must not leave the machine in a transient state. */
  private resetAfterFailure(): void {
    if (this.current === 'IDLE' || this.current === 'RUNNING') return
    logger.warn({ state: this.current }, 'supervisor_state_reset')
    this.current = 'IDLE'
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(fn, fn)
    this.chain = run.catch(() => undefined)
    return run
  }

  // ---- Cycle ----

  private async cycle(): Promise<CycleResult> {
    const actions: CycleAction[] = []
    const { config, messages, matcher } = this.deps

    const signalled = await this.applyWorkerSignal()
    if (signalled) actions.push(signalled)

    await this.expireMessages()

    const unprocessed = messages.listUnprocessed()
    const interrupts = unprocessed.filter((m) => matcher.matches(m.text))
    const inspection = await this.deps.lease.inspect()
    await this.syncMirrors(inspection)

    if (inspection.health === 'live' && inspection.record) {
      const { sessionId } = inspection.record
      if (this.current === 'IDLE') {
        await this.dispatch({ type: 'WORKER_OBSERVED', sessionId })
      }
      await this.observeLiveness(inspection)

      if (interrupts.length > 0) {
        actions.push(await this.interrupt(interrupts, unprocessed))
      } else {
        // Messages the running task already holds are not waiting
        const queued = unprocessed.some((m) => m.seenAt === null)
        actions.push(queued ? 'deferred' : 'observing')
      }
      return { actions, state: this.current, sessionId }
    }

    if (this.current === 'RUNNING') {
      await this.dispatch({ type: 'WORKER_EXITED' })
    }

    // Interrupts come before recovery: a stop that follows a crash ends the task
    let stopped: CycleAction | null = null
    if (interrupts.length > 0) {
      stopped = await this.stopAbandoned(interrupts, unprocessed)
      actions.push(stopped)
      if (stopped === 'recovery_blocked' || stopped === 'contended') {
        return { actions, state: this.current }
      }
    }

    const recovery = await this.recover(stopped ? await this.deps.lease.inspect() : inspection)
    if (recovery.action) {
      actions.push(recovery.action)
      if (recovery.action === 'recovery_blocked' || recovery.action === 'contended') {
        return { actions, state: this.current }
      }
    }

    const pending = messages.listUnprocessed().some((m) => !matcher.matches(m.text))
    const crash = await this.deps.markers.peekCrash()
    if (!recovery.heldSession && !pending && !crash) {
      actions.push('idle')
      return { actions, state: this.current }
    }

    const launch = await this.acquireAndLaunch(
      config.router.replyMatching,
      recovery.heldSession,
    )
    actions.push(launch.action)
    return { actions, state: this.current, sessionId: launch.sessionId }
  }

  // ---- Worker signals ----

  private async applyWorkerSignal(): Promise<CycleAction | null> {
    const { stateStore, markers, messages, notifier } = this.deps
    const signal = await stateStore.take(WORKER_STATUS)
    if (!signal) return null

    const task = await markers.currentTask()
    if (!task || task.sessionId !== signal.sessionId) {
      logger.warn(
        { sessionId: signal.sessionId, kind: signal.kind, active: task?.sessionId },
        'worker_signal_unmatched',
      )
      return null
    }

    if (signal.kind === 'done') {
      await markers.finishTask(task.sessionId)
      messages.markProcessed(task.sourceMessageIds)
      logger.info({ sessionId: task.sessionId, chatId: task.chatId }, 'task_completed')
      return 'completed'
    }

    let awaitingReplyTo = signal.awaitingReplyTo
    if (!awaitingReplyTo && signal.question) {
      awaitingReplyTo =
        (await notifier.notify(task.channelId, task.chatId, signal.question)) ?? undefined
    }
    if (!awaitingReplyTo) {
      logger.warn({ sessionId: task.sessionId }, 'worker_wait_without_reply_target')
      return null
    }

    await markers.finishTask(task.sessionId)
    messages.parkWaiting({
      channelId: task.channelId,
      chatId: task.chatId,
      instruction: task.instruction,
      awaitingReplyTo,
      parkedAt: this.now(),
    })
    messages.markProcessed(task.sourceMessageIds)
    return 'parked'
  }

  // ---- Housekeeping ----

  private async expireMessages(): Promise<void> {
    const { messages, config, notifier } = this.deps
    const expired = messages.expireStale(this.now(), config.messages.unprocessedTtlMs)
    for (const message of chatsOf(expired)) {
      await notifier.notify(message.channelId, message.chatId, NOTICES.expired, message.messageId)
    }
  }

  private async dropExhausted(): Promise<void> {
    const { messages, config, notifier } = this.deps
    const dropped = messages.dropExhausted(config.messages.maxDispatchAttempts)
    for (const message of chatsOf(dropped)) {
      await notifier.notify(
        message.channelId,
        message.chatId,
        NOTICES.dropped(config.messages.maxDispatchAttempts),
        message.messageId,
      )
    }
  }

  private async discardInterrupts(interrupts: readonly ChannelMessage[]): Promise<void> {
    this.deps.messages.markProcessed(interrupts.map(refOf))
    for (const message of chatsOf(interrupts)) {
      await this.deps.notifier.notify(
        message.channelId,
        message.chatId,
        NOTICES.nothingRunning,
        message.messageId,
      )
    }
    logger.info({ count: interrupts.length }, 'interrupt_without_running_task')
  }

  // ---- Live lease ----

  /**
   * Heartbeat on behalf of a worker this process spawned and still holds a
   * handle to. Workers of other processes heartbeat through their output.
   */
  private async observeLiveness(inspection: LeaseInspection): Promise<void> {
    const record = inspection.record
    if (!record) return
    if (this.deps.processes.isAlive(record.sessionId)) {
      await this.deps.lease.heartbeat(record.sessionId)
    }
  }

  /**
   * Stop the running worker. Everything queued at the time of the stop is
   * dropped along with the task; waiting tasks stay parked.
   */
  private async interrupt(
    interrupts: readonly ChannelMessage[],
    unprocessed: readonly ChannelMessage[],
  ): Promise<CycleAction> {
    const { lease, markers, messages, notifier } = this.deps
    await this.dispatch({ type: 'INTERRUPT_REQUESTED' })

    // Take the task and settle the messages before the lease goes away, so
    // a concurrent cycle can neither mistake the gap for a crash nor
    // relaunch the stopped work.
    const task = await markers.takeTask()
    if (task) messages.markProcessed(task.sourceMessageIds)
    this.dropQueued(unprocessed)
    const cleared = await lease.forceClear()
    if (!cleared) {
      if (task) await markers.beginTask(task)
      await this.dispatch({ type: 'INTERRUPT_FAILED' })
      for (const message of chatsOf(interrupts)) {
        await notifier.notify(
          message.channelId,
          message.chatId,
          NOTICES.interruptFailed,
          message.messageId,
        )
      }
      return 'interrupt_failed'
    }

    await this.stopMirrors()
    if (task) await markers.recordInterrupt(task, interruptReason(interrupts))
    await this.notifyStopped(interrupts, task)
    await this.dispatch({ type: 'INTERRUPTED' })
    return 'interrupted'
  }

  /**
   * A stop that finds the worker already dead ends the abandoned task (or a
   * crash still waiting to be resumed) instead of resuming it. The task is
   * taken under a fresh lease, as in recovery, so one process records the
   * interrupt marker.
   */
  private async stopAbandoned(
    interrupts: readonly ChannelMessage[],
    unprocessed: readonly ChannelMessage[],
  ): Promise<CycleAction> {
    const { lease, markers, messages } = this.deps
    const abandoned =
      (await markers.currentTask()) !== null || (await markers.peekCrash()) !== null
    if (!abandoned) {
      await this.discardInterrupts(interrupts)
      return 'discarded'
    }

    await this.dispatch({ type: 'ORPHAN_DETECTED' })
    const sessionId = ulid()
    if (!(await lease.tryAcquire(sessionId))) {
      const after = await lease.inspect()
      await this.dispatch({ type: 'RECOVERED' })
      return after.health === 'live' ? 'contended' : 'recovery_blocked'
    }

    let task: ActiveTask | null = null
    try {
      const crash = await markers.consumeCrash()
      task = await markers.takeTask()
      if (!task && crash) task = this.recoveryTask(sessionId, crash, crash.startedAt)
      if (task) {
        messages.markProcessed(task.sourceMessageIds)
        await markers.recordInterrupt(task, interruptReason(interrupts))
      }
      this.dropQueued(unprocessed)
    } finally {
      await lease.release(sessionId)
    }
    await this.notifyStopped(interrupts, task)
    await this.dispatch({ type: 'RECOVERED' })
    return 'interrupted'
  }

  private dropQueued(unprocessed: readonly ChannelMessage[]): void {
    const dropped = this.deps.messages.markProcessed(unprocessed.map(refOf))
    if (dropped > 0) logger.info({ count: dropped }, 'queue_cleared_on_stop')
  }

  private async notifyStopped(
    interrupts: readonly ChannelMessage[],
    task: ActiveTask | null,
  ): Promise<void> {
    const notice = task ? NOTICES.stopped(task.instruction) : NOTICES.workerStopped
    for (const message of chatsOf(interrupts)) {
      await this.deps.notifier.notify(message.channelId, message.chatId, notice, message.messageId)
    }
  }

  // ---- Recovery ----

  /**
   * Clean up after a worker that died or went silent. An abandoned task is
   * only taken while holding the lease, so exactly one process records
   * the crash; that process keeps the lease for the recovery launch.
   */
  private async recover(inspection: LeaseInspection): Promise<RecoveryResult> {
    const { lease, markers, messages, notifier } = this.deps
    const hasTask = (await markers.currentTask()) !== null

    if (!hasTask) {
      if (inspection.health === 'free') return {}
      // A standby worker or an abandoned reservation: nothing to resume
      const reaped = await lease.reap(inspection)
      if (reaped === 'unkillable') return { action: 'recovery_blocked' }
      return reaped === 'cleared' ? { action: 'stale_cleared' } : {}
    }

    await this.dispatch({ type: 'ORPHAN_DETECTED' })
    const sessionId = ulid()
    if (!(await lease.tryAcquire(sessionId))) {
      const after = await lease.inspect()
      await this.dispatch({ type: 'RECOVERED' })
      return { action: after.health === 'live' ? 'contended' : 'recovery_blocked' }
    }

    const task = await markers.takeTask()
    if (task) {
      await markers.recordCrash(task)
      // The crash marker carries these messages into the recovery session
      messages.markProcessed(task.sourceMessageIds)
      await notifier.notify(task.channelId, task.chatId, NOTICES.crashed(task.instruction))
    }
    await this.dispatch({ type: 'RECOVERED' })
    return { action: 'recovered', heldSession: sessionId }
  }

  // ---- Acquire & launch ----

  /** `heldSession` names a lease this process already acquired during recovery. */
  private async acquireAndLaunch(
    replyMatching: LeashConfig['router']['replyMatching'],
    heldSession?: string,
  ): Promise<{ action: CycleAction; sessionId?: string }> {
    const { lease, markers, messages, matcher, launcher, processes, notifier } = this.deps
    await this.dispatch({ type: 'MESSAGES_PENDING' })

    const sessionId = heldSession ?? ulid()
    if (!heldSession && !(await lease.tryAcquire(sessionId))) {
      await this.dispatch({ type: 'LEASE_HELD' })
      return { action: 'contended' }
    }

    // Re-read under the lease: another process may have handled the backlog
    const crash = await markers.peekCrash()
    const interrupt = await markers.peekInterrupt()
    const pick = pickNextTask(
      messages.listUnprocessed().filter((m) => !matcher.matches(m.text)),
      messages.listWaiting(),
      { replyMatching },
    )

    const startedAt = this.now().toISOString()
    let task: ActiveTask
    let candidate: CandidateTask | null = null
    let queued: CandidateTask[]
    if (crash) {
      task = this.recoveryTask(sessionId, crash, startedAt)
      queued = pick.task ? [pick.task, ...pick.remaining] : []
    } else if (pick.task) {
      candidate = pick.task
      queued = pick.remaining
      task = {
        sessionId,
        instruction: candidate.instruction,
        chatId: candidate.chatId,
        channelId: candidate.channelId,
        sourceMessageIds: candidate.sourceMessageIds,
        startedAt,
      }
    } else {
      await lease.release(sessionId)
      await this.dispatch({ type: 'NOTHING_TO_RUN' })
      return { action: 'idle' }
    }

    const input: WorkerInput = {
      sessionId,
      task,
      remaining: queued.map((c) => ({ chatId: c.chatId, instruction: c.instruction })),
      crash,
      interrupt,
    }

    if (candidate) messages.recordAttempt(candidate.sourceMessageIds)

    let launched: LaunchedWorker
    try {
      launched = await launcher.launch(input)
    } catch (err) {
      logger.error({ sessionId, err }, 'worker_launch_failed')
      await lease.release(sessionId)
      await this.dispatch({ type: 'LAUNCH_FAILED', error: toErrorMessage(err) })
      if (candidate) {
        await notifier.notify(task.channelId, task.chatId, NOTICES.launchFailed)
        await this.dropExhausted()
      } else {
        await this.abandonRecoveryAfterFailures(task)
      }
      return { action: 'launch_failed', sessionId }
    }
    this.recoveryFailures = 0

    processes.register(sessionId, launched.child, {
      sessionId,
      chatId: task.chatId,
      channelId: task.channelId,
    })

    if (!(await lease.attachProcess(sessionId, launched.pid))) {
      // Cleared from elsewhere while the worker was starting
      logger.warn({ sessionId, pid: launched.pid }, 'lease_lost_during_launch')
      await processes.terminate(sessionId, lease.killGraceMs)
      await this.dispatch({ type: 'LAUNCH_FAILED', error: 'lease lost during launch' })
      return { action: 'launch_failed', sessionId }
    }

    await markers.beginTask(task)
    // Markers are consumed only once a worker has actually received them
    if (crash) await markers.consumeCrash()
    if (interrupt) await markers.consumeInterrupt()
    for (const waiting of candidate?.waitingTasks ?? []) {
      messages.removeWaiting(waiting.taskId)
    }
    messages.markSeen(task.sourceMessageIds)

    this.startMirror(sessionId, launched.logFile)
    await this.dispatch({ type: 'LAUNCHED', sessionId })
    logger.info(
      { sessionId, chatId: task.chatId, recovery: crash !== null, queued: queued.length },
      'task_started',
    )
    if (candidate) {
      const [first] = candidate.sourceMessageIds
      await notifier.notify(task.channelId, task.chatId, NOTICES.accepted, first?.messageId)
    }
    return { action: 'launched', sessionId }
  }

  private async abandonRecoveryAfterFailures(task: ActiveTask): Promise<void> {
    const maxAttempts = this.deps.config.messages.maxDispatchAttempts
    this.recoveryFailures++
    if (this.recoveryFailures < maxAttempts) return
    this.recoveryFailures = 0
    await this.deps.markers.consumeCrash()
    logger.error({ chatId: task.chatId, attempts: maxAttempts }, 'crash_recovery_abandoned')
    await this.deps.notifier.notify(task.channelId, task.chatId, NOTICES.dropped(maxAttempts))
  }

  private recoveryTask(sessionId: string, crash: CrashMarker, startedAt: string): ActiveTask {
    return {
      sessionId,
      instruction: crash.instruction,
      chatId: crash.chatId,
      channelId: crash.channelId,
      sourceMessageIds: crash.sourceMessageIds,
      startedAt,
      resumedFrom: 'crash',
    }
  }

  // ---- Worker exit ----

  private async handleWorkerExit(entry: ManagedEntry<WorkerMeta>, code: number): Promise<void> {
    const { sessionId } = entry.meta
    await this.stopMirror(sessionId)
    if (entry.state === 'cancelled') return

    const { lease, markers, messages } = this.deps
    const task = await markers.currentTask()
    const owned = task?.sessionId === sessionId

    if (code === 0 || !owned) {
      const finished = await markers.finishTask(sessionId)
      if (finished) messages.markProcessed(finished.sourceMessageIds)
      await lease.release(sessionId)
      logger.info({ sessionId, exitCode: code }, 'worker_exited')
      if (this.current === 'RUNNING') {
        await this.dispatch({ type: 'WORKER_EXITED' })
      }
    } else {
      // Left in place: the next cycle sees an orphaned lease and records the crash
      logger.warn({ sessionId, exitCode: code }, 'worker_exited_with_error')
    }
    this.requestCycle()
  }

  // ---- Output mirrors ----

  private startMirror(sessionId: string, logFile: string): void {
    if (!this.mirrorOutput || this.mirrors.has(sessionId)) return
    const mirror = new OutputMirror({
      sessionId,
      logFile,
      pollIntervalMs: this.deps.config.mirror.pollIntervalMs,
      restartDelayMs: this.deps.config.mirror.restartDelayMs,
      onActivity: async () => {
        await this.deps.lease.heartbeat(sessionId)
      },
    })
    this.mirrors.set(sessionId, mirror)
    mirror.start()
  }

  private async stopMirror(sessionId: string): Promise<void> {
    const mirror = this.mirrors.get(sessionId)
    if (!mirror) return
    this.mirrors.delete(sessionId)
    await mirror.stop()
  }

  private async stopMirrors(): Promise<void> {
    await Promise.all([...this.mirrors.keys()].map((id) => this.stopMirror(id)))
  }

  /** Keep exactly one mirror, on the live lease's worker log. */
  private async syncMirrors(inspection: LeaseInspection): Promise<void> {
    const live = inspection.health === 'live' ? inspection.record : null
    for (const sessionId of [...this.mirrors.keys()]) {
      if (sessionId !== live?.sessionId) await this.stopMirror(sessionId)
    }
    if (live?.pid !== undefined) {
      this.startMirror(
        live.sessionId,
        join(this.deps.paths.logDir, `worker-${live.sessionId}.log`),
      )
    }
  }

  // ---- State ----

  private async dispatch(action: SupervisorAction): Promise<void> {
    const prev = this.current
    const next = transition(prev, action)
    this.current = next
    logger.debug({ action: action.type, prev, next }, 'supervisor_transition')

    for (const handler of this.stateHandlers) {
      try {
        handler(next, prev)
      } catch (err) {
        logger.error({ err }, 'supervisor_state_handler_error')
      }
    }

    try {
      await this.deps.stateStore.write(SUPERVISOR_STATE, {
        state: next,
        pid: process.pid,
        at: this.now().toISOString(),
      })
    } catch (err) {
      logger.warn({ err }, 'supervisor_state_persist_failed')
    }
  }
}
