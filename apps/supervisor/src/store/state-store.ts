import { link, mkdir, open, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { ulid } from 'ulid'
import * as z from 'zod'
import { logger } from '@/logger'
import { hasErrorCode, sleep } from '@/utils/async'

// ---------- Types ----------

export interface StateKey<T> {
  readonly name: string
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
}

export interface Versioned<T> {
  revision: string
  value: T
}

export interface StateStoreOptions {
  /** Age after which an abandoned mutex file is broken. Default: 10_000 */
  mutexStaleMs?: number
  /** How long compareAndSwap waits for the key mutex. Default: 5_000 */
  mutexTimeoutMs?: number
}

export function stateKey<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): StateKey<T> {
  if (!/^[a-z0-9][a-z0-9_-]*$/.test(name)) {
    throw new Error(`Invalid state key name: ${name}`)
  }
  return { name, schema }
}

const MUTEX_RETRY_MS = 10

const envelopeSchema = z.object({ revision: z.string(), value: z.unknown() })

// ---------- FileStateStore ----------

/**
 * File-backed key/value store. One JSON file per key holding
 * `{ revision, value }`. Every mutation goes through one of the
 * primitives below:
 *
 * - `create` is an exclusive create (hard link of a fully written temp
 *   file), so readers never observe a partial record.
 * - `write` replaces atomically (temp file + rename).
 * - `compareAndSwap` runs under a per-key mutex file.
 * - `take` renames the record away before reading it, so exactly one
 *   caller across all processes receives it.
 */
export class FileStateStore {
  private readonly mutexStaleMs: number
  private readonly mutexTimeoutMs: number

  constructor(
    readonly dir: string,
    options?: StateStoreOptions,
  ) {
    this.mutexStaleMs = options?.mutexStaleMs ?? 10_000
    this.mutexTimeoutMs = options?.mutexTimeoutMs ?? 5_000
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true })
  }

  // ---- Reads ----

  async read<T>(key: StateKey<T>): Promise<Versioned<T> | null> {
    const path = this.pathOf(key)
    let text: string
    try {
      text = await readFile(path, 'utf8')
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null
      throw err
    }
    const parsed = this.parse(key, text)
    if (!parsed) {
      await this.quarantine(key, path)
      return null
    }
    return parsed
  }

  async get<T>(key: StateKey<T>): Promise<T | null> {
    const record = await this.read(key)
    return record ? record.value : null
  }

  // ---- Writes ----

  /** Exclusive create. Returns false when the key already exists. */
  async create<T>(key: StateKey<T>, value: T): Promise<boolean> {
    const tmp = await this.writeTemp(key, { revision: ulid(), value })
    try {
      await link(tmp, this.pathOf(key))
      return true
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) return false
      throw err
    } finally {
      await rm(tmp, { force: true })
    }
  }

  /** Unconditional atomic replace. Returns the new revision. */
  async write<T>(key: StateKey<T>, value: T): Promise<string> {
    const revision = ulid()
    const tmp = await this.writeTemp(key, { revision, value })
    await rename(tmp, this.pathOf(key))
    return revision
  }

  /**
   * Replace (or delete, when `next` is null) the record only if its
   * current revision equals `expected`. `expected = null` means "only if
   * absent".
   */
  async compareAndSwap<T>(
    key: StateKey<T>,
    expected: string | null,
    next: T | null,
  ): Promise<boolean> {
    return this.withMutex(key, async () => {
      const current = await this.read(key)
      if ((current?.revision ?? null) !== expected) return false
      if (next === null) {
        await rm(this.pathOf(key), { force: true })
        return true
      }
      if (expected === null) {
        return this.create(key, next)
      }
      await this.write(key, next)
      return true
    })
  }

  /** Destructive read. A second call returns null. */
  async take<T>(key: StateKey<T>): Promise<T | null> {
    const path = this.pathOf(key)
    const claimed = `${path}.taken-${ulid()}`
    try {
      await rename(path, claimed)
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null
      throw err
    }
    try {
      const text = await readFile(claimed, 'utf8')
      const parsed = this.parse(key, text)
      return parsed ? parsed.value : null
    } finally {
      await rm(claimed, { force: true })
    }
  }

  async delete<T>(key: StateKey<T>): Promise<boolean> {
    try {
      await unlink(this.pathOf(key))
      return true
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return false
      throw err
    }
  }

  // ---- Internal ----

  private pathOf(key: { name: string }): string {
    return join(this.dir, `${key.name}.json`)
  }

  private parse<T>(key: StateKey<T>, text: string): Versioned<T> | null {
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (err) {
      logger.warn({ key: key.name, err }, 'state_record_unreadable')
      return null
    }
    const envelope = envelopeSchema.safeParse(json)
    if (!envelope.success) {
      logger.warn({ key: key.name, issues: envelope.error.issues }, 'state_record_invalid')
      return null
    }
    const value = key.schema.safeParse(envelope.data.value)
    if (!value.success) {
      logger.warn({ key: key.name, issues: value.error.issues }, 'state_record_invalid')
      return null
    }
    return { revision: envelope.data.revision, value: value.data }
  }

  private async quarantine(key: { name: string }, path: string): Promise<void> {
    const target = `${path}.corrupt-${ulid()}`
    try {
      await rename(path, target)
      logger.warn({ key: key.name, target }, 'state_record_quarantined')
    } catch (err) {
      if (!hasErrorCode(err, 'ENOENT')) throw err
    }
  }

  private async writeTemp(key: { name: string }, envelope: Versioned<unknown>): Promise<string> {
    await mkdir(this.dir, { recursive: true })
    const tmp = join(this.dir, `.${key.name}.${ulid()}.tmp`)
    await writeFile(tmp, `${JSON.stringify(envelope, null, 2)}\n`, { flag: 'wx' })
    return tmp
  }

  private async withMutex<R>(key: { name: string }, fn: () => Promise<R>): Promise<R> {
    await mkdir(this.dir, { recursive: true })
    const mutexPath = join(this.dir, `.${key.name}.mutex`)
    const deadline = Date.now() + this.mutexTimeoutMs

    for (;;) {
      try {
        const handle = await open(mutexPath, 'wx')
        await handle.writeFile(`${process.pid}\n`)
        await handle.close()
        break
      } catch (err) {
        if (!hasErrorCode(err, 'EEXIST')) throw err
      }

      await this.breakStaleMutex(key, mutexPath)
      if (Date.now() >= deadline) {
        throw new Error(`Timed out waiting for state mutex: ${key.name}`)
      }
      await sleep(MUTEX_RETRY_MS)
    }

    try {
      return await fn()
    } finally {
      await rm(mutexPath, { force: true })
    }
  }

  /**
   * Move a stale mutex aside, then delete it only if it is still the file
   * that was judged stale. A mutex re-created in between is put back.
   */
  private async breakStaleMutex(key: { name: string }, mutexPath: string): Promise<void> {
    const stale = await statOrNull(mutexPath)
    if (!stale || Date.now() - stale.mtimeMs < this.mutexStaleMs) return

    const tombstone = `${mutexPath}.stale-${ulid()}`
    try {
      await rename(mutexPath, tombstone)
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return
      throw err
    }

    const moved = await stat(tombstone)
    if (moved.ino === stale.ino && moved.mtimeMs === stale.mtimeMs) {
      await unlink(tombstone)
      logger.warn({ key: key.name }, 'state_mutex_broken')
      return
    }

    try {
      await link(tombstone, mutexPath)
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) throw err
      logger.warn({ key: key.name }, 'state_mutex_restore_conflict')
    }
    await unlink(tombstone)
  }
}

async function statOrNull(path: string) {
  try {
    return await stat(path)
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null
    throw err
  }
}
