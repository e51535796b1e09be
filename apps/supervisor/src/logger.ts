import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { MiddlewareHandler } from 'hono'
import pino from 'pino'
import { DATA_DIR } from './root'

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

function parseLevel(value: string | undefined): pino.LevelWithSilent {
  return LEVELS.find((l) => l === value) ?? 'info'
}

const level = parseLevel(process.env.LOG_LEVEL)
const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level
const name = process.env.SERVICE_NAME ?? 'leash'

const logDir = join(DATA_DIR, 'logs')
mkdirSync(logDir, { recursive: true })

const logFile = join(logDir, `${name}.log`)

// stdout belongs to CLI output (`leash next`, `leash status --json`)
export const logger = pino(
  { level, base: undefined },
  pino.multistream([
    { level: streamLevel, stream: process.stderr },
    { level: streamLevel, stream: pino.destination(logFile) },
  ]),
)

export function httpLogger(): MiddlewareHandler {
  return async (c, next) => {
    await next()
    if (c.req.path === '/api/health') return
    logger.debug(`${c.req.method} ${c.req.path} ${c.res.status}`)
  }
}
