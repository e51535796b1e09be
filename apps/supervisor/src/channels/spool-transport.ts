import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { InboundMessage } from '@leash/shared'
import { ulid } from 'ulid'
import { logger } from '@/logger'
import type { ChannelTransport, OutboundRecord } from './types'
import { inboundMessageSchema } from './types'

/**
 * Drop-directory channel: producers write one JSON message per file into
 * `inbox/`; replies land in `outbox/`. Unparseable files move to
 * `rejected/`.
 */
export class SpoolTransport implements ChannelTransport {
  readonly kind = 'spool'
  readonly inboxDir: string
  readonly outboxDir: string
  private readonly rejectedDir: string
  /** messageId -> inbox file name, for ack */
  private readonly pending = new Map<string, string>()

  constructor(
    readonly channelId: string,
    spoolRoot: string,
  ) {
    const base = join(spoolRoot, channelId)
    this.inboxDir = join(base, 'inbox')
    this.outboxDir = join(base, 'outbox')
    this.rejectedDir = join(base, 'rejected')
  }

  async init(): Promise<void> {
    await mkdir(this.inboxDir, { recursive: true })
    await mkdir(this.outboxDir, { recursive: true })
    await mkdir(this.rejectedDir, { recursive: true })
  }

  async fetch(): Promise<InboundMessage[]> {
    await this.init()
    const files = (await readdir(this.inboxDir)).filter((f) => f.endsWith('.json')).sort()
    const messages: InboundMessage[] = []

    for (const file of files) {
      const path = join(this.inboxDir, file)
      let parsed: unknown
      try {
        parsed = JSON.parse(await readFile(path, 'utf8'))
      } catch (err) {
        await this.reject(file, err)
        continue
      }
      const result = inboundMessageSchema.safeParse(parsed)
      if (!result.success) {
        await this.reject(file, result.error.issues)
        continue
      }
      this.pending.set(result.data.messageId, file)
      messages.push(result.data)
    }
    return messages
  }

  async ack(messageIds: readonly string[]): Promise<void> {
    for (const id of messageIds) {
      const file = this.pending.get(id)
      if (!file) continue
      await rm(join(this.inboxDir, file), { force: true })
      this.pending.delete(id)
    }
  }

  async send(chatId: string, text: string, replyTo?: string): Promise<string> {
    await mkdir(this.outboxDir, { recursive: true })
    const messageId = `out-${ulid()}`
    const record: OutboundRecord = {
      messageId,
      chatId,
      text,
      replyTo: replyTo ?? null,
      sentAt: new Date().toISOString(),
    }
    const tmp = join(this.outboxDir, `.${messageId}.tmp`)
    await writeFile(tmp, `${JSON.stringify(record, null, 2)}\n`)
    await rename(tmp, join(this.outboxDir, `${messageId}.json`))
    return messageId
  }

  private async reject(file: string, reason: unknown): Promise<void> {
    logger.warn({ channelId: this.channelId, file, reason }, 'spool_message_rejected')
    await rename(join(this.inboxDir, file), join(this.rejectedDir, file))
  }
}
