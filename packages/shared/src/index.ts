// @leash/shared: types shared between @leash/supervisor and worker-side tooling.

export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: string }

// ---------- Messages ----------

export type MessageDirection = 'inbound' | 'outbound'

export type ChannelMessage = {
  channelId: string
  messageId: string
  chatId: string
  senderId: string
  text: string
  receivedAt: string
  replyToMessageId: string | null
  direction: MessageDirection
  processed: boolean
  attempts: number
  seenAt: string | null
}

/** Shape accepted by channel ingest and `leash send`. */
export type InboundMessage = {
  messageId: string
  chatId: string
  senderId: string
  text: string
  receivedAt?: string
  replyToMessageId?: string
}

// ---------- Tasks ----------

/** Reference to a stored message, unique across channels. */
export type MessageRef = {
  channelId: string
  messageId: string
}

export type ActiveTask = {
  sessionId: string
  instruction: string
  chatId: string
  channelId: string
  sourceMessageIds: MessageRef[]
  startedAt: string
  resumedFrom?: string
}

export type WaitingTask = {
  taskId: string
  instruction: string
  chatId: string
  channelId: string
  awaitingReplyTo: string
  parkedAt: string
}

// ---------- Markers ----------

export type CrashMarker = {
  kind: 'crash'
  instruction: string
  sourceMessageIds: MessageRef[]
  chatId: string
  channelId: string
  startedAt: string
  detectedAt: string
}

export type InterruptMarker = {
  kind: 'interrupt'
  previousInstruction: string
  previousMessageIds: MessageRef[]
  chatId: string
  channelId: string
  reason: string
  interruptedAt: string
}

export type Marker = CrashMarker | InterruptMarker

// ---------- Lease ----------

export type LeaseRecord = {
  sessionId: string
  /** Epoch seconds */
  acquiredAt: number
  /** Epoch seconds */
  lastHeartbeatAt: number
  /** Worker process, once launched */
  pid?: number
  /** Process that took the lease; covers the window before the worker exists */
  ownerPid?: number
}

export type LeaseHealth = 'free' | 'live' | 'stale' | 'orphaned'

// ---------- Worker protocol ----------

export type WorkerSignal =
  | { sessionId: string; kind: 'done'; at: string }
  | {
      sessionId: string
      kind: 'waiting'
      /** Message the answer must reply to; when absent the question is sent and its id used */
      awaitingReplyTo?: string
      question?: string
      at: string
    }

/** Written to `sessions/<id>/input.json` before the worker starts. */
export type WorkerInput = {
  sessionId: string
  task: ActiveTask
  remaining: Array<{ chatId: string; instruction: string }>
  crash: CrashMarker | null
  interrupt: InterruptMarker | null
}

// ---------- Status ----------

export type SupervisorState = 'IDLE' | 'ACQUIRING' | 'RUNNING' | 'INTERRUPTING' | 'RECOVERING'

export type ChannelCounts = {
  channelId: string
  pending: number
  processed: number
}

export type SupervisorStatus = {
  state: SupervisorState | null
  lease: { health: LeaseHealth; record: LeaseRecord | null }
  activeTask: ActiveTask | null
  waiting: WaitingTask[]
  counts: ChannelCounts[]
  lastMarker: Marker | null
  supervisorPid: number | null
}
