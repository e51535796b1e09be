import type { ChildProcess } from 'node:child_process'
import { constants } from 'node:os'
import { signalProcess } from '@/lease/process-control'

// ---------- Types ----------

export type ProcessState = 'running' | 'completed' | 'failed' | 'cancelled'

const TERMINAL_STATES: ReadonlySet<ProcessState> = new Set(['completed', 'failed', 'cancelled'])

export interface ManagedEntry<TMeta> {
  readonly id: string
  readonly child: ChildProcess
  readonly pid: number | undefined
  /** Resolves with the exit code (128 + signal number when killed). */
  readonly exited: Promise<number>
  state: ProcessState
  readonly startedAt: Date
  finishedAt?: Date
  exitCode?: number
  readonly meta: TMeta
}

export interface ProcessManagerLogger {
  debug: (obj: object, msg?: string) => void
  info: (obj: object, msg?: string) => void
  warn: (obj: object, msg?: string) => void
  error: (obj: object, msg?: string) => void
}

export interface ProcessManagerOptions {
  /** Active process limit. 0 = unlimited. Default: 0 */
  maxConcurrent?: number
  /** Delay (ms) before auto-removing a finished entry. 0 = no auto-removal. Default: 300_000 */
  autoCleanupDelayMs?: number
  /** Timeout (ms) before SIGKILL after SIGTERM. Default: 5_000 */
  killTimeoutMs?: number
  logger?: ProcessManagerLogger
}

export type ProcessExitHandler<T> = (entry: ManagedEntry<T>, exitCode: number) => void
export type UnsubscribeFn = () => void

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = constants.signals

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code
  if (signal) return 128 + (SIGNAL_NUMBERS[signal] ?? 0)
  return 1
}

/** Exit promise for a child, settled by `exit`, or by `error` when spawning failed. */
export function childExited(child: ChildProcess): Promise<number> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve(exitCodeOf(child.exitCode, child.signalCode))
  }
  return new Promise((resolve) => {
    child.once('exit', (code, signal) => resolve(exitCodeOf(code, signal)))
    child.once('error', () => {
      if (child.pid === undefined) resolve(1)
    })
  })
}

// ---------- ProcessManager ----------

/**
 * Registry of child processes this host spawned. Gives handle-based
 * liveness (no pid probing) and a terminate path that escalates to
 * SIGKILL.
 */
export class ProcessManager<TMeta> {
  private entries = new Map<string, ManagedEntry<TMeta>>()
  private cleanupTimers = new Map<string, ReturnType<typeof setTimeout>>()

  private exitHandlers = new Map<number, ProcessExitHandler<TMeta>>()
  private nextHandlerId = 0

  private readonly maxConcurrent: number
  private readonly autoCleanupDelayMs: number
  private readonly killTimeoutMs: number
  private readonly log: ProcessManagerLogger

  constructor(
    private readonly name: string,
    options?: ProcessManagerOptions,
  ) {
    this.maxConcurrent = options?.maxConcurrent ?? 0
    this.autoCleanupDelayMs = options?.autoCleanupDelayMs ?? 300_000
    this.killTimeoutMs = options?.killTimeoutMs ?? 5_000
    this.log = options?.logger ?? { debug() {}, info() {}, warn() {}, error() {} }
  }

  // ---- Registration & State Transitions ----

  /** Track a spawned child; it counts as running until it exits or is terminated. */
  register(id: string, child: ChildProcess, meta: TMeta): ManagedEntry<TMeta> {
    if (this.entries.has(id)) {
      throw new Error(`[${this.name}] Process already registered: ${id}`)
    }

    if (this.maxConcurrent > 0 && this.activeCount() >= this.maxConcurrent) {
      throw new Error(
        `[${this.name}] Concurrency limit reached (${this.activeCount()}/${this.maxConcurrent})`,
      )
    }

    const entry: ManagedEntry<TMeta> = {
      id,
      child,
      pid: child.pid,
      exited: childExited(child),
      state: 'running',
      startedAt: new Date(),
      meta,
    }

    this.entries.set(id, entry)
    this.monitorExit(entry)
    this.log.debug({ pm: this.name, id, pid: entry.pid, state: entry.state }, 'pm_registered')
    return entry
  }

  // ---- Termination ----

  /**
   * SIGTERM (to the process group when the child is detached), SIGKILL
   * after `killTimeoutMs`. Resolves with whether the child exited.
   */
  async terminate(id: string, killTimeoutMs: number = this.killTimeoutMs): Promise<boolean> {
    const entry = this.entries.get(id)
    if (!entry) return true
    if (this.hasExited(entry)) return true

    if (!TERMINAL_STATES.has(entry.state)) {
      this.transitionState(id, 'cancelled')
    }
    this.sendSignal(entry, 'SIGTERM')

    const killTimeout = setTimeout(() => {
      this.log.warn({ pm: this.name, id, pid: entry.pid }, 'pm_kill_timeout_sigkill')
      this.sendSignal(entry, 'SIGKILL')
    }, killTimeoutMs)

    // Bounded: a process stuck in uninterruptible sleep may survive SIGKILL
    let giveUp: ReturnType<typeof setTimeout> | undefined
    const settled = await Promise.race([
      entry.exited.then(() => true),
      new Promise<false>((resolve) => {
        giveUp = setTimeout(() => resolve(false), killTimeoutMs + 2_000)
      }),
    ])
    clearTimeout(killTimeout)
    clearTimeout(giveUp)
    if (!entry.finishedAt) {
      entry.finishedAt = new Date()
    }
    return settled
  }

  async terminateAll(): Promise<void> {
    await Promise.all(Array.from(this.entries.keys()).map((id) => this.terminate(id)))
  }

  // ---- Queries ----

  get(id: string): ManagedEntry<TMeta> | undefined {
    return this.entries.get(id)
  }

  findByPid(pid: number): ManagedEntry<TMeta> | undefined {
    for (const entry of this.entries.values()) {
      if (entry.pid === pid) return entry
    }
    return undefined
  }

  /** True while the child has not exited, regardless of its bookkeeping state. */
  isAlive(id: string): boolean {
    const entry = this.entries.get(id)
    return entry !== undefined && !this.hasExited(entry)
  }

  private activeCount(): number {
    let count = 0
    for (const entry of this.entries.values()) {
      if (this.isActive(entry)) count++
    }
    return count
  }

  // ---- Events ----

  onExit(handler: ProcessExitHandler<TMeta>): UnsubscribeFn {
    const id = this.nextHandlerId++
    this.exitHandlers.set(id, handler)
    return () => {
      this.exitHandlers.delete(id)
    }
  }

  // ---- Cleanup ----

  private remove(id: string): void {
    const timer = this.cleanupTimers.get(id)
    if (timer) {
      clearTimeout(timer)
      this.cleanupTimers.delete(id)
    }
    this.entries.delete(id)
  }

  async dispose(): Promise<void> {
    for (const timer of this.cleanupTimers.values()) {
      clearTimeout(timer)
    }
    this.cleanupTimers.clear()
    await this.terminateAll()
    this.entries.clear()
    this.exitHandlers.clear()
  }

  // ---- Internal ----

  private isActive(entry: ManagedEntry<TMeta>): boolean {
    return !TERMINAL_STATES.has(entry.state)
  }

  private hasExited(entry: ManagedEntry<TMeta>): boolean {
    return (
      entry.exitCode !== undefined ||
      entry.child.exitCode !== null ||
      entry.child.signalCode !== null ||
      entry.pid === undefined
    )
  }

  private sendSignal(entry: ManagedEntry<TMeta>, signal: NodeJS.Signals): void {
    if (entry.pid === undefined || this.hasExited(entry)) return
    try {
      signalProcess(entry.pid, signal)
    } catch (err) {
      this.log.warn({ pm: this.name, id: entry.id, signal, err }, 'pm_signal_failed')
    }
  }

  private transitionState(id: string, next: ProcessState): void {
    const entry = this.entries.get(id)
    if (!entry) return
    if (TERMINAL_STATES.has(entry.state)) return
    entry.state = next

    if (TERMINAL_STATES.has(next) && !entry.finishedAt) {
      entry.finishedAt = new Date()
    }

    if (TERMINAL_STATES.has(next) && this.autoCleanupDelayMs > 0) {
      this.scheduleAutoCleanup(id)
    }
  }

  private monitorExit(entry: ManagedEntry<TMeta>): void {
    void entry.exited.then((code) => {
      entry.exitCode = code

      // Only transition if not already terminal (idempotent)
      if (!TERMINAL_STATES.has(entry.state)) {
        const next: ProcessState = code === 0 ? 'completed' : 'failed'
        this.transitionState(entry.id, next)
      } else if (!entry.finishedAt) {
        entry.finishedAt = new Date()
      }

      this.log.debug({ pm: this.name, id: entry.id, exitCode: code }, 'pm_exited')
      this.emitExit(entry, code)
    })
  }

  private scheduleAutoCleanup(id: string): void {
    const existing = this.cleanupTimers.get(id)
    if (existing) clearTimeout(existing)
    const timer = setTimeout(() => {
      this.cleanupTimers.delete(id)
      this.remove(id)
    }, this.autoCleanupDelayMs)
    timer.unref()
    this.cleanupTimers.set(id, timer)
  }

  private emitExit(entry: ManagedEntry<TMeta>, exitCode: number): void {
    for (const handler of this.exitHandlers.values()) {
      try {
        handler(entry, exitCode)
      } catch (err) {
        this.log.error({ pm: this.name, id: entry.id, err }, 'pm_exit_handler_failed')
      }
    }
  }
}
