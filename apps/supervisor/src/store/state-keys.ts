import type {
  ActiveTask,
  CrashMarker,
  InterruptMarker,
  LeaseRecord,
  Marker,
  SupervisorState,
  WorkerSignal,
} from '@leash/shared'
import * as z from 'zod'
import { stateKey } from './state-store'

// ---------- Schemas ----------

const messageRefSchema = z.object({
  channelId: z.string(),
  messageId: z.string(),
})

export const leaseSchema = z.object({
  sessionId: z.string().min(1),
  acquiredAt: z.number().int(),
  lastHeartbeatAt: z.number().int(),
  pid: z.number().int().positive().optional(),
  ownerPid: z.number().int().positive().optional(),
})

export const activeTaskSchema = z.object({
  sessionId: z.string(),
  instruction: z.string(),
  chatId: z.string(),
  channelId: z.string(),
  sourceMessageIds: z.array(messageRefSchema),
  startedAt: z.string(),
  resumedFrom: z.string().optional(),
})

export const crashMarkerSchema = z.object({
  kind: z.literal('crash'),
  instruction: z.string(),
  sourceMessageIds: z.array(messageRefSchema),
  chatId: z.string(),
  channelId: z.string(),
  startedAt: z.string(),
  detectedAt: z.string(),
})

export const interruptMarkerSchema = z.object({
  kind: z.literal('interrupt'),
  previousInstruction: z.string(),
  previousMessageIds: z.array(messageRefSchema),
  chatId: z.string(),
  channelId: z.string(),
  reason: z.string(),
  interruptedAt: z.string(),
})

export const workerSignalSchema = z.discriminatedUnion('kind', [
  z.object({ sessionId: z.string(), kind: z.literal('done'), at: z.string() }),
  z.object({
    sessionId: z.string(),
    kind: z.literal('waiting'),
    awaitingReplyTo: z.string().min(1).optional(),
    question: z.string().min(1).optional(),
    at: z.string(),
  }),
])

const processRecordSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
  host: z.string().optional(),
  port: z.number().int().optional(),
})

export type ProcessRecord = z.infer<typeof processRecordSchema>

const supervisorStateSchema = z.object({
  state: z.enum(['IDLE', 'ACQUIRING', 'RUNNING', 'INTERRUPTING', 'RECOVERING']),
  pid: z.number().int(),
  at: z.string(),
})

export type SupervisorStateRecord = {
  state: SupervisorState
  pid: number
  at: string
}

// ---------- Keys ----------

export const LEASE = stateKey<LeaseRecord>('lease', leaseSchema)
export const ACTIVE_TASK = stateKey<ActiveTask>('active-task', activeTaskSchema)
export const CRASH_MARKER = stateKey<CrashMarker>('crash-marker', crashMarkerSchema)
export const INTERRUPT_MARKER = stateKey<InterruptMarker>('interrupt-marker', interruptMarkerSchema)
export const LAST_MARKER = stateKey<Marker>(
  'last-marker',
  z.discriminatedUnion('kind', [crashMarkerSchema, interruptMarkerSchema]),
)
export const WORKER_STATUS = stateKey<WorkerSignal>('worker-status', workerSignalSchema)
export const SUPERVISOR_PROCESS = stateKey<ProcessRecord>('supervisor', processRecordSchema)
export const SUPERVISOR_STATE = stateKey<SupervisorStateRecord>(
  'supervisor-state',
  supervisorStateSchema,
)

export function watcherProcessKey(channelId: string) {
  return stateKey<ProcessRecord>(`watcher-${channelId.toLowerCase()}`, processRecordSchema)
}
