import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core'
import { customAlphabet } from 'nanoid'
import { ulid } from 'ulid'

const readableId = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 8)

export function shortId() {
  return text('id')
    .primaryKey()
    .$defaultFn(() => readableId())
}

export function id() {
  return text('id')
    .primaryKey()
    .$defaultFn(() => ulid())
}

export const commonFields = {
  createdAt: integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date())
    .$onUpdateFn(() => new Date()),
}

// Keep in sync with schema.sql
export const messages = sqliteTable(
  'messages',
  {
    id: id(),
    channelId: text('channel_id').notNull(),
    messageId: text('message_id').notNull(),
    chatId: text('chat_id').notNull(),
    senderId: text('sender_id').notNull(),
    text: text('text').notNull(),
    direction: text('direction', { enum: ['inbound', 'outbound'] })
      .notNull()
      .default('inbound'),
    receivedAt: integer('received_at', { mode: 'timestamp_ms' }).notNull(),
    replyToMessageId: text('reply_to_message_id'),
    processed: integer('processed', { mode: 'boolean' }).notNull().default(false),
    processedAt: integer('processed_at', { mode: 'timestamp_ms' }),
    attempts: integer('attempts').notNull().default(0),
    seenAt: integer('seen_at', { mode: 'timestamp_ms' }),
    ...commonFields,
  },
  (table) => [
    uniqueIndex('messages_channel_message_uniq').on(table.channelId, table.messageId),
    index('messages_processed_idx').on(table.processed, table.receivedAt),
    index('messages_chat_idx').on(table.channelId, table.chatId),
  ],
)

export const waitingTasks = sqliteTable(
  'waiting_tasks',
  {
    id: shortId(),
    channelId: text('channel_id').notNull(),
    chatId: text('chat_id').notNull(),
    instruction: text('instruction').notNull(),
    awaitingReplyTo: text('awaiting_reply_to').notNull(),
    parkedAt: integer('parked_at', { mode: 'timestamp_ms' }).notNull(),
    ...commonFields,
  },
  (table) => [index('waiting_tasks_chat_idx').on(table.channelId, table.chatId)],
)
