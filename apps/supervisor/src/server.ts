import type { AddressInfo } from 'node:net'
import { serve } from '@hono/node-server'
import type { Hono } from 'hono'
import { logger } from './logger'

export interface StatusServer {
  host: string
  port: number
  close: () => Promise<void>
}

/** Serve `app` on host:port. Rejects when the address cannot be bound. */
export function startStatusServer(app: Hono, host: string, port: number): Promise<StatusServer> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, hostname: host, port }, (info: AddressInfo) => {
      server.off('error', reject)
      logger.info({ host, port: info.port }, 'server_started')
      resolve({
        host,
        port: info.port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => {
              if (err) {
                fail(err)
              } else {
                logger.info('server_stopped')
                done()
              }
            })
          }),
      })
    })
    server.once('error', reject)
  })
}
