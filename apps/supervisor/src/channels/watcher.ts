import { logger } from '@/logger'
import type { MessageStore } from '@/store/message-store'
import { sleep } from '@/utils/async'
import type { ChannelTransport } from './types'

export interface WatcherOptions {
  pollIntervalMs: number
  /** Backoff ceiling after repeated transport errors. Default: 60_000 */
  maxBackoffMs?: number
  /** Called after a poll when unprocessed messages exist */
  onPending?: () => Promise<void>
}

/**
 * Polls one channel transport into the message store. Transport errors
 * are retried with exponential backoff and never reach lease state.
 */
export class ChannelWatcher {
  private failures = 0
  private readonly maxBackoffMs: number

  constructor(
    private readonly transport: ChannelTransport,
    private readonly store: MessageStore,
    private readonly options: WatcherOptions,
  ) {
    this.maxBackoffMs = options.maxBackoffMs ?? 60_000
  }

  get channelId(): string {
    return this.transport.channelId
  }

  /** Fetch, append (idempotent) and acknowledge. Returns the number of new rows. */
  async pollOnce(): Promise<number> {
    const batch = await this.transport.fetch()
    if (batch.length === 0) return 0

    let inserted = 0
    for (const message of batch) {
      const added = this.store.append({
        channelId: this.transport.channelId,
        messageId: message.messageId,
        chatId: message.chatId,
        senderId: message.senderId,
        text: message.text,
        receivedAt: message.receivedAt ? new Date(message.receivedAt) : new Date(),
        replyToMessageId: message.replyToMessageId ?? null,
      })
      if (added) inserted++
    }
    await this.transport.ack(batch.map((m) => m.messageId))

    if (inserted > 0) {
      logger.info({ channelId: this.transport.channelId, inserted }, 'watcher_messages_received')
    }
    return inserted
  }

  /** Delay before the next poll given the current failure streak. */
  nextDelayMs(): number {
    if (this.failures === 0) return this.options.pollIntervalMs
    const backoff = this.options.pollIntervalMs * 2 ** Math.min(this.failures, 10)
    return Math.min(backoff, this.maxBackoffMs)
  }

  async run(signal: AbortSignal): Promise<void> {
    logger.info({ channelId: this.transport.channelId }, 'watcher_started')
    while (!signal.aborted) {
      try {
        await this.pollOnce()
        this.failures = 0
      } catch (err) {
        this.failures++
        logger.warn(
          { channelId: this.transport.channelId, failures: this.failures, err },
          'watcher_fetch_failed',
        )
      }

      if (this.failures === 0 && this.options.onPending && this.hasPending()) {
        try {
          await this.options.onPending()
        } catch (err) {
          logger.error({ channelId: this.transport.channelId, err }, 'watcher_trigger_failed')
        }
      }

      await sleep(this.nextDelayMs(), signal)
    }
    logger.info({ channelId: this.transport.channelId }, 'watcher_stopped')
  }

  private hasPending(): boolean {
    return this.store.counts().some((c) => c.pending > 0)
  }
}
