import type { InboundMessage } from '@leash/shared'
import * as z from 'zod'

export const inboundMessageSchema = z.object({
  messageId: z.string().min(1).max(200),
  chatId: z.string().min(1).max(200),
  senderId: z.string().min(1).max(200),
  text: z.string().max(100_000),
  receivedAt: z.string().datetime({ offset: true }).optional(),
  replyToMessageId: z.string().min(1).max(200).optional(),
})

/**
 * Wire side of one messaging channel. Fetch is at-least-once: messages
 * stay available until acknowledged, and the message store dedups.
 */
export interface ChannelTransport {
  readonly channelId: string
  readonly kind: 'spool' | 'http'
  fetch: () => Promise<InboundMessage[]>
  ack: (messageIds: readonly string[]) => Promise<void>
  /** Deliver a message to a chat. Resolves with the sent message id. */
  send: (chatId: string, text: string, replyTo?: string) => Promise<string>
}

export interface OutboundRecord {
  messageId: string
  chatId: string
  text: string
  replyTo: string | null
  sentAt: string
}
