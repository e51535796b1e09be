import type { InboundMessage } from '@leash/shared'
import { ulid } from 'ulid'
import type { ChannelTransport, OutboundRecord } from './types'

const MAX_OUTBOX = 1_000

/**
 * In-process channel fed by the status server's ingest route. Replies are
 * buffered until a client drains them through the outbox route.
 */
export class HttpTransport implements ChannelTransport {
  readonly kind = 'http'
  private inbox: InboundMessage[] = []
  private outbox: OutboundRecord[] = []

  constructor(readonly channelId: string) {}

  enqueue(message: InboundMessage): void {
    this.inbox.push(message)
  }

  async fetch(): Promise<InboundMessage[]> {
    return [...this.inbox]
  }

  async ack(messageIds: readonly string[]): Promise<void> {
    const acked = new Set(messageIds)
    this.inbox = this.inbox.filter((m) => !acked.has(m.messageId))
  }

  async send(chatId: string, text: string, replyTo?: string): Promise<string> {
    const messageId = `out-${ulid()}`
    this.outbox.push({
      messageId,
      chatId,
      text,
      replyTo: replyTo ?? null,
      sentAt: new Date().toISOString(),
    })
    if (this.outbox.length > MAX_OUTBOX) {
      this.outbox.splice(0, this.outbox.length - MAX_OUTBOX)
    }
    return messageId
  }

  drainOutbox(): OutboundRecord[] {
    const drained = this.outbox
    this.outbox = []
    return drained
  }
}
