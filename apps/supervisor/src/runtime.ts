import type { SupervisorStatus } from '@leash/shared'
import { ChannelNotifier, ChannelWatcher, createTransports } from '@/channels'
import type { ChannelTransport } from '@/channels/types'
import type { LeashConfig } from '@/config'
import { type DbHandle, openDatabase } from '@/db'
import { LeaseManager, type ProcessProbe } from '@/lease/lease-manager'
import { logger } from '@/logger'
import { MarkerRecorder } from '@/markers/recorder'
import type { DataPaths } from '@/root'
import { createInterruptMatcher, type InterruptMatcher } from '@/router/interrupt'
import { MessageStore } from '@/store/message-store'
import { SUPERVISOR_STATE } from '@/store/state-keys'
import { FileStateStore } from '@/store/state-store'
import { ProcessManager } from '@/supervisor/process-manager'
import { createProcessProbe, Supervisor, type WorkerMeta } from '@/supervisor/supervisor'
import { type Launcher, WorkerLauncher } from '@/supervisor/worker-launcher'

export interface RuntimeOptions {
  config: LeashConfig
  paths: DataPaths
  mirrorOutput?: boolean
  /** Overrides for tests */
  launcher?: Launcher
  probe?: ProcessProbe
  now?: () => Date
}

/** Everything one leash process needs, wired against one data directory. */
export interface Runtime {
  config: LeashConfig
  paths: DataPaths
  db: DbHandle
  messages: MessageStore
  stateStore: FileStateStore
  lease: LeaseManager
  markers: MarkerRecorder
  processes: ProcessManager<WorkerMeta>
  transports: Map<string, ChannelTransport>
  matcher: InterruptMatcher
  supervisor: Supervisor
  createWatcher: (channelId: string) => ChannelWatcher
  /** Workers are detached and outlive the runtime unless `killWorkers` is set. */
  close: (options?: { killWorkers?: boolean }) => Promise<void>
}

export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { config, paths } = options
  const now = options.now ?? (() => new Date())

  const stateStore = new FileStateStore(paths.stateDir)
  await stateStore.init()

  const db = openDatabase(paths.dbFile)
  const messages = new MessageStore(db.db)
  const processes = new ProcessManager<WorkerMeta>('worker', {
    maxConcurrent: 1,
    killTimeoutMs: config.lease.killGraceMs,
    logger,
  })
  const lease = new LeaseManager(stateStore, {
    stalenessMs: config.lease.stalenessMs,
    killGraceMs: config.lease.killGraceMs,
    probe: options.probe ?? createProcessProbe(processes),
    now: () => now().getTime(),
  })
  const markers = new MarkerRecorder(stateStore, now)
  const transports = createTransports(config.channels, paths.spoolDir)
  const notifier = new ChannelNotifier(transports, messages)
  const matcher = createInterruptMatcher(config.interrupt.match, config.interrupt.extraKeywords)

  const supervisor = new Supervisor({
    config,
    paths,
    messages,
    stateStore,
    lease,
    markers,
    launcher: options.launcher ?? new WorkerLauncher(config.worker, paths),
    notifier,
    processes,
    matcher,
    mirrorOutput: options.mirrorOutput,
    now,
  })

  const createWatcher = (channelId: string): ChannelWatcher => {
    const transport = transports.get(channelId)
    if (!transport) {
      throw new Error(`Unknown channel: ${channelId}`)
    }
    const channel = config.channels.find((c) => c.id === channelId)
    return new ChannelWatcher(transport, messages, {
      pollIntervalMs: channel?.pollIntervalMs ?? config.pollIntervalMs,
      onPending: async () => {
        supervisor.requestCycle()
      },
    })
  }

  return {
    config,
    paths,
    db,
    messages,
    stateStore,
    lease,
    markers,
    processes,
    transports,
    matcher,
    supervisor,
    createWatcher,
    async close(closeOptions) {
      await supervisor.dispose()
      if (closeOptions?.killWorkers) {
        await processes.dispose()
      }
      db.close()
    },
  }
}

// ---------- Status ----------

/**
 * Snapshot for `leash status` and the status route. Reads shared state, so
 * it reports the same thing from any process.
 */
export async function collectStatus(runtime: Runtime): Promise<SupervisorStatus> {
  const [inspection, activeTask, lastMarker, persisted] = await Promise.all([
    runtime.lease.inspect(),
    runtime.markers.currentTask(),
    runtime.markers.last(),
    runtime.stateStore.get(SUPERVISOR_STATE),
  ])

  return {
    state: persisted?.state ?? runtime.supervisor.state,
    lease: { health: inspection.health, record: inspection.record },
    activeTask,
    waiting: runtime.messages.listWaiting(),
    counts: runtime.messages.counts(),
    lastMarker,
    supervisorPid: persisted?.pid ?? null,
  }
}
