import type { ChannelMessage, MessageRef, WaitingTask } from '@leash/shared'

// ---------- Types ----------

/**
 * `latest-in-chat`: a message without reply threading resumes the most
 * recently parked waiting task of its chat.
 * `threaded`: only an explicit reply to the awaited message resumes.
 */
export type ReplyMatching = 'latest-in-chat' | 'threaded'

export interface RouterOptions {
  replyMatching: ReplyMatching
}

export interface CandidateTask {
  kind: 'fresh' | 'resume'
  channelId: string
  chatId: string
  instruction: string
  /** Source messages in arrival order */
  messages: ChannelMessage[]
  sourceMessageIds: MessageRef[]
  firstReceivedAt: string
  /** Parked tasks this task resumes (empty for fresh tasks) */
  waitingTasks: WaitingTask[]
}

export interface PickResult {
  task: CandidateTask | null
  remaining: CandidateTask[]
}

const DEFAULT_OPTIONS: RouterOptions = { replyMatching: 'latest-in-chat' }

// ---------- Helpers ----------

function chatKey(channelId: string, chatId: string): string {
  return `${channelId}\u0000${chatId}`
}

function byArrival(a: ChannelMessage, b: ChannelMessage): number {
  return Date.parse(a.receivedAt) - Date.parse(b.receivedAt)
}

function byFirstArrival(a: CandidateTask, b: CandidateTask): number {
  return Date.parse(a.firstReceivedAt) - Date.parse(b.firstReceivedAt)
}

export function mergeTexts(messages: readonly ChannelMessage[]): string {
  return messages
    .map((m) => m.text.trim())
    .filter((t) => t.length > 0)
    .join('\n')
}

function findWaitingMatch(
  messages: readonly ChannelMessage[],
  waiting: readonly WaitingTask[],
  options: RouterOptions,
): WaitingTask | undefined {
  if (waiting.length === 0) return undefined

  for (const message of messages) {
    if (!message.replyToMessageId) continue
    const match = waiting.find((w) => w.awaitingReplyTo === message.replyToMessageId)
    if (match) return match
  }

  if (options.replyMatching === 'latest-in-chat' && messages.some((m) => !m.replyToMessageId)) {
    return waiting.reduce((latest, w) =>
      Date.parse(w.parkedAt) >= Date.parse(latest.parkedAt) ? w : latest,
    )
  }
  return undefined
}

// ---------- Router ----------

/**
 * Decide which single task the worker gets next.
 *
 * Messages are grouped per chat and merged in arrival order, so several
 * messages sent before the worker was free become one instruction. A chat
 * whose messages answer a parked task resumes it; resumptions go before
 * fresh tasks, and fresh tasks go oldest first.
 */
export function pickNextTask(
  unprocessed: readonly ChannelMessage[],
  waiting: readonly WaitingTask[] = [],
  options: RouterOptions = DEFAULT_OPTIONS,
): PickResult {
  const groups = new Map<string, ChannelMessage[]>()
  for (const message of [...unprocessed].sort(byArrival)) {
    const key = chatKey(message.channelId, message.chatId)
    const group = groups.get(key)
    if (group) {
      group.push(message)
    } else {
      groups.set(key, [message])
    }
  }

  const waitingByChat = new Map<string, WaitingTask[]>()
  for (const task of waiting) {
    const key = chatKey(task.channelId, task.chatId)
    const list = waitingByChat.get(key)
    if (list) {
      list.push(task)
    } else {
      waitingByChat.set(key, [task])
    }
  }

  const resumes: CandidateTask[] = []
  const fresh: CandidateTask[] = []

  for (const [key, messages] of groups) {
    const first = messages[0]
    if (!first) continue
    const base = {
      channelId: first.channelId,
      chatId: first.chatId,
      messages,
      sourceMessageIds: messages.map((m) => ({ channelId: m.channelId, messageId: m.messageId })),
      firstReceivedAt: first.receivedAt,
    }
    const match = findWaitingMatch(messages, waitingByChat.get(key) ?? [], options)

    if (match) {
      resumes.push({
        ...base,
        kind: 'resume',
        instruction: `${match.instruction}\n\n${mergeTexts(messages)}`,
        waitingTasks: [match],
      })
    } else {
      fresh.push({ ...base, kind: 'fresh', instruction: mergeTexts(messages), waitingTasks: [] })
    }
  }

  const ordered = [...resumes.sort(byFirstArrival), ...fresh.sort(byFirstArrival)]
  const [task, ...remaining] = ordered
  return { task: task ?? null, remaining }
}

/**
 * Merge several candidate tasks into one, oldest first. Used when a
 * standby worker drains a backlog in a single turn.
 */
export function combineTasks(tasks: readonly CandidateTask[]): CandidateTask | null {
  const sorted = [...tasks].sort(byFirstArrival)
  const [first] = sorted
  if (!first) return null
  if (sorted.length === 1) return first

  const messages = sorted.flatMap((t) => t.messages).sort(byArrival)
  return {
    kind: first.kind,
    channelId: first.channelId,
    chatId: first.chatId,
    instruction: sorted.map((t) => t.instruction).join('\n\n---\n\n'),
    messages,
    sourceMessageIds: messages.map((m) => ({ channelId: m.channelId, messageId: m.messageId })),
    firstReceivedAt: first.firstReceivedAt,
    waitingTasks: sorted.flatMap((t) => t.waitingTasks),
  }
}
