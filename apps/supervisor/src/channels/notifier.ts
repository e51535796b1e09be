import { logger } from '@/logger'
import type { MessageStore } from '@/store/message-store'
import type { ChannelTransport } from './types'

/**
 * User-facing notices. Resolves with the sent message id, or null when
 * delivery failed (logged, never thrown).
 */
export interface Notifier {
  notify: (
    channelId: string,
    chatId: string,
    text: string,
    replyTo?: string,
  ) => Promise<string | null>
}

export class ChannelNotifier implements Notifier {
  constructor(
    private readonly transports: ReadonlyMap<string, ChannelTransport>,
    private readonly store: MessageStore,
  ) {}

  async notify(
    channelId: string,
    chatId: string,
    text: string,
    replyTo?: string,
  ): Promise<string | null> {
    const transport = this.transports.get(channelId)
    if (!transport) {
      logger.warn({ channelId, chatId }, 'notify_unknown_channel')
      return null
    }
    try {
      const messageId = await transport.send(chatId, text, replyTo)
      this.store.recordOutbound({ channelId, messageId, chatId, text, replyToMessageId: replyTo })
      logger.debug({ channelId, chatId, messageId }, 'notice_sent')
      return messageId
    } catch (err) {
      logger.warn({ channelId, chatId, err }, 'notify_failed')
      return null
    }
  }
}
