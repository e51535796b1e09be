import { zValidator } from '@hono/zod-validator'
import type { ApiResponse } from '@leash/shared'
import { Hono } from 'hono'
import { HttpTransport } from '@/channels/http-transport'
import { inboundMessageSchema } from '@/channels/types'
import { checkDbHealth } from '@/db'
import { logger } from '@/logger'
import { collectStatus, type Runtime } from '@/runtime'
import { VERSION } from '@/version'

const CHANNEL_NOT_FOUND: ApiResponse<never> = { success: false, error: 'Channel not found' }

export function apiRoutes(runtime: Runtime) {
  const routes = new Hono()

  function httpChannel(channelId: string): HttpTransport | null {
    const transport = runtime.transports.get(channelId)
    return transport instanceof HttpTransport ? transport : null
  }

  routes.get('/', (c) => {
    return c.json({
      success: true,
      data: {
        name: 'leash',
        status: 'ok',
        routes: [
          'GET /api',
          'GET /api/health',
          'GET /api/status',
          'POST /api/channels/:channelId/messages',
          'GET /api/channels/:channelId/outbox',
        ],
      },
    })
  })

  routes.get('/health', (c) => {
    const dbHealth = checkDbHealth(runtime.db)
    return c.json({
      success: true,
      data: {
        status: 'ok',
        version: VERSION,
        db: dbHealth.ok ? 'ok' : 'error',
        timestamp: new Date().toISOString(),
      },
    })
  })

  routes.get('/status', async (c) => {
    return c.json({ success: true, data: await collectStatus(runtime) })
  })

  routes.post(
    '/channels/:channelId/messages',
    zValidator('json', inboundMessageSchema, (result, c) => {
      if (!result.success) {
        return c.json(
          {
            success: false,
            error: result.error.issues.map((i) => i.message).join(', '),
          },
          400,
        )
      }
    }),
    (c) => {
      const channelId = c.req.param('channelId')
      const transport = httpChannel(channelId)
      if (!transport) {
        return c.json(CHANNEL_NOT_FOUND, 404)
      }
      const message = c.req.valid('json')
      transport.enqueue(message)
      logger.debug({ channelId, messageId: message.messageId }, 'http_message_enqueued')
      return c.json({ success: true, data: { queued: true, messageId: message.messageId } }, 202)
    },
  )

  routes.get('/channels/:channelId/outbox', (c) => {
    const transport = httpChannel(c.req.param('channelId'))
    if (!transport) {
      return c.json(CHANNEL_NOT_FOUND, 404)
    }
    return c.json({ success: true, data: transport.drainOutbox() })
  })

  return routes
}
