import type { ChannelConfig } from '@/config'
import { HttpTransport } from './http-transport'
import { SpoolTransport } from './spool-transport'
import type { ChannelTransport } from './types'

export { ChannelNotifier, type Notifier } from './notifier'
export { HttpTransport } from './http-transport'
export { SpoolTransport } from './spool-transport'
export type { ChannelTransport } from './types'
export { ChannelWatcher } from './watcher'

export function createTransport(channel: ChannelConfig, spoolRoot: string): ChannelTransport {
  switch (channel.transport) {
    case 'spool':
      return new SpoolTransport(channel.id, spoolRoot)
    case 'http':
      return new HttpTransport(channel.id)
  }
}

export function createTransports(
  channels: readonly ChannelConfig[],
  spoolRoot: string,
): Map<string, ChannelTransport> {
  const transports = new Map<string, ChannelTransport>()
  for (const channel of channels) {
    if (transports.has(channel.id)) {
      throw new Error(`Duplicate channel id in config: ${channel.id}`)
    }
    transports.set(channel.id, createTransport(channel, spoolRoot))
  }
  return transports
}
