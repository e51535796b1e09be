import { Buffer } from 'node:buffer'
import { timingSafeEqual } from 'node:crypto'
import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { secureHeaders } from 'hono/secure-headers'
import { httpLogger, logger } from './logger'
import { apiRoutes } from './routes/api'
import type { Runtime } from './runtime'

export interface AppOptions {
  /** Bearer token required on /api/* (except health). Unset disables auth. */
  apiSecret?: string
}

function tokenMatches(token: string, secret: string): boolean {
  const tokenBuf = Buffer.from(token)
  const secretBuf = Buffer.from(secret)
  return tokenBuf.length === secretBuf.length && timingSafeEqual(tokenBuf, secretBuf)
}

export function createApp(runtime: Runtime, options: AppOptions = {}) {
  const app = new Hono()

  app.use(secureHeaders())
  app.use(httpLogger())

  app.use('/api/*', async (c, next) => {
    const apiSecret = options.apiSecret
    if (!apiSecret) {
      return next()
    }

    if (c.req.path === '/api/health') {
      return next()
    }

    const authHeader = c.req.header('Authorization')
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return c.json({ success: false, error: 'Unauthorized' }, 401)
    }
    if (!tokenMatches(authHeader.slice(7), apiSecret)) {
      return c.json({ success: false, error: 'Unauthorized' }, 401)
    }

    return next()
  })

  app.route('/api', apiRoutes(runtime))

  app.all('/api/*', (c) => {
    return c.json({ success: false, error: 'Not Found' }, 404)
  })

  app.onError((err, c) => {
    logger.error(
      {
        message: err.message,
        stack: err.stack,
        path: c.req.path,
        method: c.req.method,
      },
      'unhandled_error',
    )

    if (err instanceof HTTPException && err.status === 400) {
      return c.json({ success: false, error: err.message }, 400)
    }
    if (err instanceof SyntaxError && err.message.includes('JSON')) {
      return c.json({ success: false, error: 'Invalid JSON' }, 400)
    }
    return c.json({ success: false, error: 'Internal server error' }, 500)
  })

  return app
}
