import { existsSync, readFileSync } from 'node:fs'
import * as z from 'zod'
import { type DataPaths, dataPaths } from './root'

// ---------- Schema ----------

const channelSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-z0-9][a-z0-9_-]*$/i),
  transport: z.enum(['spool', 'http']).default('spool'),
  pollIntervalMs: z.number().int().positive().optional(),
})

export const configSchema = z.object({
  /** Interval of the supervisor loop and the default watcher poll. */
  pollIntervalMs: z.number().int().positive().default(3_000),
  lease: z
    .object({
      stalenessMs: z
        .number()
        .int()
        .positive()
        .default(30 * 60_000),
      killGraceMs: z.number().int().min(0).max(30_000).default(3_000),
    })
    .default({}),
  worker: z
    .object({
      command: z.string().min(1).default('claude'),
      args: z.array(z.string()).default(['-p', '{prompt}']),
      cwd: z.string().optional(),
      env: z.record(z.string()).default({}),
    })
    .default({}),
  interrupt: z
    .object({
      match: z.enum(['exact', 'contains']).default('exact'),
      extraKeywords: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  router: z
    .object({
      replyMatching: z.enum(['latest-in-chat', 'threaded']).default('latest-in-chat'),
    })
    .default({}),
  messages: z
    .object({
      maxDispatchAttempts: z.number().int().positive().default(3),
      unprocessedTtlMs: z
        .number()
        .int()
        .positive()
        .default(24 * 60 * 60_000),
    })
    .default({}),
  channels: z
    .array(channelSchema)
    // Ids name per-channel state files, which are case-folded
    .superRefine((channels, ctx) => {
      const seen = new Set<string>()
      channels.forEach((channel, index) => {
        const folded = channel.id.toLowerCase()
        if (seen.has(folded)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'id'],
            message: `Channel ids must be unique ignoring case: ${channel.id}`,
          })
        }
        seen.add(folded)
      })
    })
    .default([{ id: 'local', transport: 'spool' }]),
  status: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65_535).default(7878),
    })
    .default({}),
  mirror: z
    .object({
      pollIntervalMs: z.number().int().positive().default(500),
      restartDelayMs: z.number().int().positive().default(1_000),
    })
    .default({}),
})

export type LeashConfig = z.infer<typeof configSchema>
export type LeashConfigInput = z.input<typeof configSchema>
export type ChannelConfig = LeashConfig['channels'][number]

const envSchema = z.object({
  LEASH_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  LEASH_HOST: z.string().min(1).optional(),
  LEASH_PORT: z.coerce.number().int().min(0).max(65_535).optional(),
  LEASH_WORKER_COMMAND: z.string().min(1).optional(),
})

// ---------- Loading ----------

/**
 * Read `<dataDir>/config.json` (optional), validate it and apply
 * environment overrides. Throws a ZodError on invalid values.
 */
export function loadConfig(
  paths: DataPaths = dataPaths(),
  env: Record<string, string | undefined> = process.env,
): LeashConfig {
  let raw: unknown = {}
  if (existsSync(paths.configFile)) {
    const text = readFileSync(paths.configFile, 'utf8')
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new Error(
        `Invalid JSON in ${paths.configFile}: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
  }

  const config = configSchema.parse(raw)
  const overrides = envSchema.parse(env)

  if (overrides.LEASH_POLL_INTERVAL_MS !== undefined) {
    config.pollIntervalMs = overrides.LEASH_POLL_INTERVAL_MS
  }
  if (overrides.LEASH_HOST !== undefined) {
    config.status.host = overrides.LEASH_HOST
  }
  if (overrides.LEASH_PORT !== undefined) {
    config.status.port = overrides.LEASH_PORT
  }
  if (overrides.LEASH_WORKER_COMMAND !== undefined) {
    config.worker.command = overrides.LEASH_WORKER_COMMAND
  }
  return config
}

export function defineConfig(input: LeashConfigInput = {}): LeashConfig {
  return configSchema.parse(input)
}
