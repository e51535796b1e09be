import { type ParseArgsConfig, parseArgs } from 'node:util'
import type { SupervisorStatus } from '@leash/shared'
import * as z from 'zod'
import { createApp } from './app'
import { type LeashConfig, loadConfig } from './config'
import { isPidAlive } from './lease/process-control'
import { logger } from './logger'
import {
  claimNext,
  heartbeat,
  registerProcess,
  sendMessage,
  stopAll,
  unregisterProcess,
  writeWorkerSignal,
} from './operations'
import { dataPaths } from './root'
import { collectStatus, createRuntime, type Runtime } from './runtime'
import { type StatusServer, startStatusServer } from './server'
import { SUPERVISOR_PROCESS, watcherProcessKey } from './store/state-keys'
import { toErrorMessage } from './utils/async'
import { VERSION } from './version'

// ---------- Options ----------

const HELP_OPTION = { help: { type: 'boolean', short: 'h' } } as const

const START_OPTIONS = { ...HELP_OPTION, 'no-server': { type: 'boolean' } } as const
const STATUS_OPTIONS = { ...HELP_OPTION, json: { type: 'boolean' } } as const
const STOP_OPTIONS = { ...HELP_OPTION, json: { type: 'boolean' } } as const
const WATCH_OPTIONS = { ...HELP_OPTION, channel: { type: 'string', short: 'c' } } as const
const SEND_OPTIONS = {
  ...HELP_OPTION,
  channel: { type: 'string', short: 'c' },
  chat: { type: 'string' },
  sender: { type: 'string' },
  'reply-to': { type: 'string' },
} as const
const SIGNAL_OPTIONS = {
  ...HELP_OPTION,
  session: { type: 'string' },
  'reply-to': { type: 'string' },
  question: { type: 'string' },
} as const
const SESSION_OPTIONS = { ...HELP_OPTION, session: { type: 'string' } } as const
const NEXT_OPTIONS = { ...SESSION_OPTIONS, json: { type: 'boolean' } } as const

type OptionsConfig = NonNullable<ParseArgsConfig['options']>

const HELP = `leash ${VERSION} - supervise one long-running worker fed by chat channels

Usage:
  leash start [--no-server]             Run the supervisor, channel watchers and status server
  leash stop [--json]                   Stop supervisor and watchers, terminate the worker
  leash status [--json]                 Lease liveness, pending counts, last marker
  leash watch --channel <id>            Run a single channel watcher
  leash send --chat <id> [--channel <id>] [--reply-to <id>] <text...>
  leash signal done|wait [--reply-to <id>] [--question <text>] [--session <id>]
  leash heartbeat [--session <id>]
  leash next [--json] [--session <id>]

Environment:
  LEASH_HOME        data directory (default ./data)
  LEASH_SESSION_ID  worker session, set for launched workers
  LOG_LEVEL         fatal|error|warn|info|debug|trace|silent
  API_SECRET        bearer token for the status server`

// ---------- Helpers ----------

function parseCommand<O extends OptionsConfig>(argv: string[], options: O) {
  try {
    return parseArgs({ args: argv, options, allowPositionals: true, strict: true })
  } catch (err) {
    console.error(`Error: ${toErrorMessage(err)}`)
    return null
  }
}

function rejectPositionals(command: string, positionals: readonly string[]): boolean {
  if (positionals.length === 0) return false
  console.error(`Error: unexpected arguments for ${command}: ${positionals.join(' ')}`)
  return true
}

function loadCliConfig(): LeashConfig | null {
  try {
    return loadConfig(dataPaths())
  } catch (err) {
    if (err instanceof z.ZodError) {
      console.error('Error: invalid configuration')
      for (const issue of err.issues) {
        console.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      }
    } else {
      console.error(`Error: ${toErrorMessage(err)}`)
    }
    return null
  }
}

/** Open a runtime for one short command and always close it. */
async function withRuntime(fn: (runtime: Runtime) => Promise<number>): Promise<number> {
  const config = loadCliConfig()
  if (!config) return 1
  const runtime = await createRuntime({ config, paths: dataPaths(), mirrorOutput: false })
  try {
    return await fn(runtime)
  } catch (err) {
    console.error(`Error: ${toErrorMessage(err)}`)
    return 1
  } finally {
    await runtime.close()
  }
}

function resolveSession(value: string | undefined): string {
  const sessionId = value ?? process.env.LEASH_SESSION_ID
  if (!sessionId) {
    throw new Error('No session: pass --session or set LEASH_SESSION_ID')
  }
  return sessionId
}

/** Resolves on the first SIGINT/SIGTERM; a second one exits immediately. */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    let isShuttingDown = false
    const listener = (signal: NodeJS.Signals) => {
      if (isShuttingDown) {
        logger.warn({ signal }, 'forced_exit')
        process.exit(1)
      }
      isShuttingDown = true
      resolve(signal)
    }
    process.on('SIGINT', listener)
    process.on('SIGTERM', listener)
  })
}

// ---------- Status formatting ----------

function ago(epochSeconds: number, now: number): string {
  return `${Math.max(0, Math.round(now / 1000 - epochSeconds))}s ago`
}

function firstLine(text: string): string {
  const [line = ''] = text.trim().split('\n')
  return line.length > 72 ? `${line.slice(0, 71)}…` : line
}

export function formatStatus(status: SupervisorStatus, now: number = Date.now()): string {
  const lines: string[] = []
  const pid = status.supervisorPid === null ? 'no supervisor' : `supervisor pid ${status.supervisorPid}`
  lines.push(`state: ${status.state ?? 'unknown'} (${pid})`)

  const { health, record } = status.lease
  if (record) {
    const worker = record.pid === undefined ? 'no worker yet' : `worker pid ${record.pid}`
    lines.push(
      `lease: ${health} session ${record.sessionId}, ${worker}, heartbeat ${ago(record.lastHeartbeatAt, now)}`,
    )
  } else {
    lines.push('lease: free')
  }

  if (status.activeTask) {
    lines.push(`active task: [${status.activeTask.chatId}] ${firstLine(status.activeTask.instruction)}`)
  }
  if (status.waiting.length > 0) {
    lines.push(`waiting for replies: ${status.waiting.length}`)
  }
  for (const count of status.counts) {
    lines.push(`channel ${count.channelId}: ${count.pending} pending, ${count.processed} processed`)
  }
  if (status.lastMarker?.kind === 'crash') {
    lines.push(`last marker: crash detected ${status.lastMarker.detectedAt}`)
  } else if (status.lastMarker?.kind === 'interrupt') {
    lines.push(
      `last marker: interrupt at ${status.lastMarker.interruptedAt} (${status.lastMarker.reason})`,
    )
  }
  return lines.join('\n')
}

// ---------- Commands ----------

async function handleStart(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, START_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('start', parsed.positionals)) return 1

  const config = loadCliConfig()
  if (!config) return 1
  const runtime = await createRuntime({ config, paths: dataPaths() })

  try {
    await registerProcess(runtime, SUPERVISOR_PROCESS)
  } catch (err) {
    console.error(`Error: supervisor ${toErrorMessage(err)}`)
    await runtime.close()
    return 1
  }

  let server: StatusServer | null = null
  if (config.status.enabled && !parsed.values['no-server']) {
    const { host, port } = config.status
    try {
      server = await startStatusServer(
        createApp(runtime, { apiSecret: process.env.API_SECRET }),
        host,
        port,
      )
      await registerProcess(runtime, SUPERVISOR_PROCESS, { host, port: server.port })
    } catch (err) {
      logger.error({ err, host, port }, 'server_bind_failed')
      console.error(`Error: cannot serve status on ${host}:${port}: ${toErrorMessage(err)}`)
      await unregisterProcess(runtime, SUPERVISOR_PROCESS)
      await runtime.close()
      return 1
    }
  }

  const controller = new AbortController()
  const loops = [
    runtime.supervisor.run(controller.signal),
    ...config.channels.map((channel) => runtime.createWatcher(channel.id).run(controller.signal)),
  ]
  const where = server ? `, status on http://${server.host}:${server.port}` : ''
  console.log(`leash supervisor started (pid ${process.pid}${where})`)

  const signal = await waitForShutdownSignal()
  logger.warn({ signal }, 'supervisor_shutdown')
  controller.abort()
  await Promise.all(loops)
  await server?.close()
  await unregisterProcess(runtime, SUPERVISOR_PROCESS)
  // The worker is detached and keeps running; the next supervisor adopts it
  await runtime.close()
  return 0
}

async function handleWatch(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, WATCH_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('watch', parsed.positionals)) return 1

  const config = loadCliConfig()
  if (!config) return 1
  const channelId = parsed.values.channel ?? config.channels[0]?.id
  if (!channelId || !config.channels.some((c) => c.id === channelId)) {
    console.error(`Error: unknown channel ${channelId ?? '(none configured)'}`)
    return 1
  }

  const runtime = await createRuntime({ config, paths: dataPaths(), mirrorOutput: false })
  const key = watcherProcessKey(channelId)
  try {
    await registerProcess(runtime, key)
  } catch (err) {
    console.error(`Error: watcher for ${channelId} ${toErrorMessage(err)}`)
    await runtime.close()
    return 1
  }

  const controller = new AbortController()
  const loops = [
    runtime.createWatcher(channelId).run(controller.signal),
    runtime.supervisor.run(controller.signal),
  ]
  console.log(`leash watcher for ${channelId} started (pid ${process.pid})`)

  const signal = await waitForShutdownSignal()
  logger.warn({ signal, channelId }, 'watcher_shutdown')
  controller.abort()
  await Promise.all(loops)
  await unregisterProcess(runtime, key)
  await runtime.close()
  return 0
}

async function handleStatus(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, STATUS_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('status', parsed.positionals)) return 1

  return withRuntime(async (runtime) => {
    const status = await collectStatus(runtime)
    const record = await runtime.stateStore.get(SUPERVISOR_PROCESS)
    const running = record !== null && isPidAlive(record.pid)
    const report = { ...status, supervisorPid: running && record ? record.pid : null }
    if (parsed.values.json) {
      console.log(JSON.stringify(report, null, 2))
    } else {
      console.log(formatStatus(report))
    }
    return 0
  })
}

async function handleStop(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, STOP_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('stop', parsed.positionals)) return 1

  return withRuntime(async (runtime) => {
    const report = await stopAll(runtime)
    const failed =
      !report.workerStopped ||
      report.supervisor === 'unkillable' ||
      Object.values(report.watchers).includes('unkillable')

    if (parsed.values.json) {
      console.log(JSON.stringify(report, null, 2))
    } else {
      console.log(`supervisor: ${report.supervisor}`)
      for (const [channelId, result] of Object.entries(report.watchers)) {
        console.log(`watcher ${channelId}: ${result}`)
      }
      console.log(`worker: ${report.workerStopped ? 'stopped' : 'still running'}`)
      if (report.interruptedInstruction) {
        console.log(`interrupted task: ${firstLine(report.interruptedInstruction)}`)
      }
    }
    return failed ? 1 : 0
  })
}

async function handleSend(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, SEND_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  const text = parsed.positionals.join(' ').trim()
  const chatId = parsed.values.chat
  if (!chatId || !text) {
    console.error('Error: send needs --chat <id> and a message text')
    return 1
  }

  return withRuntime(async (runtime) => {
    const channelId = parsed.values.channel ?? runtime.config.channels[0]?.id
    if (!channelId) {
      throw new Error('No channel configured')
    }
    const messageId = sendMessage(runtime, {
      channelId,
      chatId,
      text,
      senderId: parsed.values.sender,
      replyToMessageId: parsed.values['reply-to'],
    })
    console.log(messageId)
    return 0
  })
}

async function handleSignal(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, SIGNAL_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  const [kind, ...extra] = parsed.positionals
  if ((kind !== 'done' && kind !== 'wait') || extra.length > 0) {
    console.error('Error: signal takes exactly one of: done, wait')
    return 1
  }

  return withRuntime(async (runtime) => {
    const sessionId = resolveSession(parsed.values.session)
    const at = new Date().toISOString()
    if (kind === 'done') {
      await writeWorkerSignal(runtime, { sessionId, kind: 'done', at })
    } else {
      await writeWorkerSignal(runtime, {
        sessionId,
        kind: 'waiting',
        awaitingReplyTo: parsed.values['reply-to'],
        question: parsed.values.question,
        at,
      })
    }
    return 0
  })
}

async function handleHeartbeat(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, SESSION_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('heartbeat', parsed.positionals)) return 1

  return withRuntime(async (runtime) => {
    const sessionId = resolveSession(parsed.values.session)
    if (!(await heartbeat(runtime, sessionId))) {
      console.error(`Error: session ${sessionId} does not hold the lease`)
      return 1
    }
    return 0
  })
}

async function handleNext(argv: string[]): Promise<number> {
  const parsed = parseCommand(argv, NEXT_OPTIONS)
  if (!parsed) return 1
  if (parsed.values.help) {
    console.log(HELP)
    return 0
  }
  if (rejectPositionals('next', parsed.positionals)) return 1

  return withRuntime(async (runtime) => {
    const work = await claimNext(runtime, resolveSession(parsed.values.session))
    if (parsed.values.json) {
      console.log(JSON.stringify(work))
    } else if (work) {
      console.log(`[chat ${work.chatId}]\n${work.instruction}`)
    }
    return 0
  })
}

// ---------- Entry ----------

const COMMANDS: Record<string, (argv: string[]) => Promise<number>> = {
  start: handleStart,
  stop: handleStop,
  status: handleStatus,
  watch: handleWatch,
  send: handleSend,
  signal: handleSignal,
  heartbeat: handleHeartbeat,
  next: handleNext,
}

export async function runCli(argv: string[]): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    console.log(HELP)
    return command ? 0 : 1
  }
  if (command === '--version' || command === '-v') {
    console.log(VERSION)
    return 0
  }

  const handler = COMMANDS[command]
  if (!handler) {
    console.error(`Error: unknown command ${command}\n\n${HELP}`)
    return 1
  }
  return handler(rest)
}
