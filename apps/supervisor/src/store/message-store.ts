import type { ChannelCounts, ChannelMessage, MessageRef, WaitingTask } from '@leash/shared'
import { and, asc, eq, gte, inArray, isNull, lt, sql } from 'drizzle-orm'
import type { LeashDb } from '@/db'
import { messages, waitingTasks } from '@/db/schema'
import { logger } from '@/logger'

// ---------- Types ----------

export interface AppendInput {
  channelId: string
  messageId: string
  chatId: string
  senderId: string
  text: string
  receivedAt: Date
  replyToMessageId?: string | null
}

export interface OutboundInput {
  channelId: string
  messageId: string
  chatId: string
  text: string
  replyToMessageId?: string | null
}

export interface ParkInput {
  channelId: string
  chatId: string
  instruction: string
  awaitingReplyTo: string
  parkedAt?: Date
}

type MessageRow = typeof messages.$inferSelect
type WaitingRow = typeof waitingTasks.$inferSelect

export const OUTBOUND_SENDER_ID = 'leash'

function serializeMessage(row: MessageRow): ChannelMessage {
  return {
    channelId: row.channelId,
    messageId: row.messageId,
    chatId: row.chatId,
    senderId: row.senderId,
    text: row.text,
    receivedAt: row.receivedAt.toISOString(),
    replyToMessageId: row.replyToMessageId,
    direction: row.direction,
    processed: row.processed,
    attempts: row.attempts,
    seenAt: row.seenAt ? row.seenAt.toISOString() : null,
  }
}

function serializeWaiting(row: WaitingRow): WaitingTask {
  return {
    taskId: row.id,
    instruction: row.instruction,
    chatId: row.chatId,
    channelId: row.channelId,
    awaitingReplyTo: row.awaitingReplyTo,
    parkedAt: row.parkedAt.toISOString(),
  }
}

/** Group refs by channel so updates can use one IN clause per channel. */
function byChannel(refs: readonly MessageRef[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>()
  for (const ref of refs) {
    const ids = grouped.get(ref.channelId)
    if (ids) {
      ids.push(ref.messageId)
    } else {
      grouped.set(ref.channelId, [ref.messageId])
    }
  }
  return grouped
}

// ---------- MessageStore ----------

/**
 * Append-only record of channel messages plus the parked (waiting) tasks.
 * Rows are never deleted; `processed` only flips false -> true.
 */
export class MessageStore {
  constructor(private readonly db: LeashDb) {}

  // ---- Messages ----

  /** Idempotent on (channelId, messageId). Returns true when a row was inserted. */
  append(input: AppendInput): boolean {
    const result = this.db
      .insert(messages)
      .values({
        channelId: input.channelId,
        messageId: input.messageId,
        chatId: input.chatId,
        senderId: input.senderId,
        text: input.text,
        direction: 'inbound',
        receivedAt: input.receivedAt,
        replyToMessageId: input.replyToMessageId ?? null,
      })
      .onConflictDoNothing({ target: [messages.channelId, messages.messageId] })
      .run()

    const inserted = result.changes === 1
    if (!inserted) {
      logger.debug(
        { channelId: input.channelId, messageId: input.messageId },
        'message_duplicate_ignored',
      )
    }
    return inserted
  }

  /** Notices sent back to a chat are kept (already processed) for reply matching. */
  recordOutbound(input: OutboundInput): void {
    const now = new Date()
    this.db
      .insert(messages)
      .values({
        channelId: input.channelId,
        messageId: input.messageId,
        chatId: input.chatId,
        senderId: OUTBOUND_SENDER_ID,
        text: input.text,
        direction: 'outbound',
        receivedAt: now,
        replyToMessageId: input.replyToMessageId ?? null,
        processed: true,
        processedAt: now,
      })
      .onConflictDoNothing({ target: [messages.channelId, messages.messageId] })
      .run()
  }

  get(ref: MessageRef): ChannelMessage | null {
    const row = this.db
      .select()
      .from(messages)
      .where(and(eq(messages.channelId, ref.channelId), eq(messages.messageId, ref.messageId)))
      .get()
    return row ? serializeMessage(row) : null
  }

  /** Unprocessed inbound messages in arrival order. */
  listUnprocessed(): ChannelMessage[] {
    return this.db
      .select()
      .from(messages)
      .where(and(eq(messages.processed, false), eq(messages.direction, 'inbound')))
      .orderBy(asc(messages.receivedAt), asc(messages.id))
      .all()
      .map(serializeMessage)
  }

  /**
   * Only call AFTER the worker has consumed the messages (or they were
   * explicitly discarded) so a failed launch does not lose them.
   */
  markProcessed(refs: readonly MessageRef[]): number {
    let changed = 0
    const now = new Date()
    for (const [channelId, ids] of byChannel(refs)) {
      const result = this.db
        .update(messages)
        .set({ processed: true, processedAt: now })
        .where(
          and(
            eq(messages.channelId, channelId),
            inArray(messages.messageId, ids),
            eq(messages.processed, false),
          ),
        )
        .run()
      changed += result.changes
    }
    return changed
  }

  markSeen(refs: readonly MessageRef[]): number {
    let changed = 0
    const now = new Date()
    for (const [channelId, ids] of byChannel(refs)) {
      const result = this.db
        .update(messages)
        .set({ seenAt: now })
        .where(
          and(
            eq(messages.channelId, channelId),
            inArray(messages.messageId, ids),
            isNull(messages.seenAt),
          ),
        )
        .run()
      changed += result.changes
    }
    return changed
  }

  recordAttempt(refs: readonly MessageRef[]): void {
    for (const [channelId, ids] of byChannel(refs)) {
      this.db
        .update(messages)
        .set({ attempts: sql`${messages.attempts} + 1` })
        .where(and(eq(messages.channelId, channelId), inArray(messages.messageId, ids)))
        .run()
    }
  }

  /** Force-process unprocessed inbound messages older than `ttlMs`. */
  expireStale(now: Date, ttlMs: number): ChannelMessage[] {
    const cutoff = new Date(now.getTime() - ttlMs)
    const expired = this.db
      .select()
      .from(messages)
      .where(
        and(
          eq(messages.processed, false),
          eq(messages.direction, 'inbound'),
          lt(messages.receivedAt, cutoff),
        ),
      )
      .all()
      .map(serializeMessage)

    if (expired.length > 0) {
      this.markProcessed(expired)
      logger.warn({ count: expired.length, ttlMs }, 'messages_expired_unprocessed')
    }
    return expired
  }

  /** Give up on unprocessed messages whose launches kept failing. */
  dropExhausted(maxAttempts: number): ChannelMessage[] {
    const exhausted = this.db
      .select()
      .from(messages)
      .where(
        and(
          eq(messages.processed, false),
          eq(messages.direction, 'inbound'),
          gte(messages.attempts, maxAttempts),
        ),
      )
      .orderBy(asc(messages.receivedAt), asc(messages.id))
      .all()
      .map(serializeMessage)

    if (exhausted.length > 0) {
      this.markProcessed(exhausted)
      logger.warn({ count: exhausted.length, maxAttempts }, 'messages_dropped_after_retries')
    }
    return exhausted
  }

  counts(): ChannelCounts[] {
    const rows = this.db
      .select({
        channelId: messages.channelId,
        pending: sql<number>`sum(case when ${messages.processed} = 0 then 1 else 0 end)`,
        processed: sql<number>`sum(case when ${messages.processed} = 1 then 1 else 0 end)`,
      })
      .from(messages)
      .where(eq(messages.direction, 'inbound'))
      .groupBy(messages.channelId)
      .orderBy(asc(messages.channelId))
      .all()

    return rows.map((row) => ({
      channelId: row.channelId,
      pending: Number(row.pending),
      processed: Number(row.processed),
    }))
  }

  // ---- Waiting tasks ----

  parkWaiting(input: ParkInput): WaitingTask {
    const [row] = this.db
      .insert(waitingTasks)
      .values({
        channelId: input.channelId,
        chatId: input.chatId,
        instruction: input.instruction,
        awaitingReplyTo: input.awaitingReplyTo,
        parkedAt: input.parkedAt ?? new Date(),
      })
      .returning()
      .all()
    if (!row) {
      throw new Error(`Failed to park waiting task for chat ${input.chatId}`)
    }
    logger.info(
      { taskId: row.id, chatId: row.chatId, awaitingReplyTo: row.awaitingReplyTo },
      'task_parked_waiting',
    )
    return serializeWaiting(row)
  }

  /** Oldest parked first. */
  listWaiting(): WaitingTask[] {
    return this.db
      .select()
      .from(waitingTasks)
      .orderBy(asc(waitingTasks.parkedAt), asc(waitingTasks.id))
      .all()
      .map(serializeWaiting)
  }

  removeWaiting(taskId: string): boolean {
    const result = this.db.delete(waitingTasks).where(eq(waitingTasks.id, taskId)).run()
    return result.changes > 0
  }
}
