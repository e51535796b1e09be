import type { LeaseHealth, LeaseRecord } from '@leash/shared'
import { logger } from '@/logger'
import { LEASE } from '@/store/state-keys'
import type { FileStateStore } from '@/store/state-store'
import { epochSeconds } from '@/utils/async'
import { isPidAlive, terminatePid } from './process-control'

// ---------- Types ----------

/** Liveness and termination of a pid. */
export interface ProcessProbe {
  isAlive: (pid: number) => boolean
  /** Resolves with whether the process is gone. */
  terminate: (pid: number, graceMs: number) => Promise<boolean>
}

export const osProcessProbe: ProcessProbe = {
  isAlive: isPidAlive,
  terminate: terminatePid,
}

export interface LeaseManagerOptions {
  /** Default: 30 minutes */
  stalenessMs?: number
  /** SIGTERM -> SIGKILL grace for forceClear. Default: 3_000 */
  killGraceMs?: number
  probe?: ProcessProbe
  now?: () => number
}

export type ReapResult = 'cleared' | 'changed' | 'unkillable'

export interface LeaseInspection {
  health: LeaseHealth
  record: LeaseRecord | null
  revision: string | null
}

// ---------- LeaseManager ----------

/**
 * Exclusive-execution lease over the worker. Backed by one record in the
 * state store; acquisition is an exclusive create so racing watchers
 * cannot both win.
 */
export class LeaseManager {
  readonly stalenessMs: number
  readonly killGraceMs: number
  private readonly probe: ProcessProbe
  private readonly now: () => number

  constructor(
    private readonly store: FileStateStore,
    options?: LeaseManagerOptions,
  ) {
    this.stalenessMs = options?.stalenessMs ?? 30 * 60_000
    this.killGraceMs = options?.killGraceMs ?? 3_000
    this.probe = options?.probe ?? osProcessProbe
    this.now = options?.now ?? Date.now
  }

  async inspect(): Promise<LeaseInspection> {
    const current = await this.store.read(LEASE)
    if (!current) return { health: 'free', record: null, revision: null }
    return {
      health: this.classify(current.value),
      record: current.value,
      revision: current.revision,
    }
  }

  async isLive(): Promise<boolean> {
    return (await this.inspect()).health === 'live'
  }

  async current(): Promise<LeaseRecord | null> {
    return this.store.get(LEASE)
  }

  async tryAcquire(sessionId: string): Promise<boolean> {
    const nowSec = epochSeconds(this.now())
    const record: LeaseRecord = {
      sessionId,
      acquiredAt: nowSec,
      lastHeartbeatAt: nowSec,
      ownerPid: process.pid,
    }

    if (await this.store.create(LEASE, record)) {
      logger.info({ sessionId }, 'lease_acquired')
      return true
    }

    const existing = await this.inspect()
    if (existing.health === 'live') {
      logger.debug({ sessionId, holder: existing.record?.sessionId }, 'lease_contended')
      return false
    }
    if (existing.health === 'free' || !existing.record) {
      // released between our create and read
      return this.store.create(LEASE, record)
    }

    const reaped = await this.reap(existing)
    if (reaped !== 'cleared') return false

    const acquired = await this.store.create(LEASE, record)
    if (acquired) {
      logger.info({ sessionId }, 'lease_acquired')
    }
    return acquired
  }

  /**
   * Remove a stale or orphaned lease seen by `inspect`. A holder that is
   * still running is terminated first; the delete only goes through if the
   * record is unchanged since the inspection.
   */
  async reap(inspection: LeaseInspection): Promise<ReapResult> {
    const { record, revision } = inspection
    if (!record || revision === null) return 'cleared'
    if (inspection.health === 'live') return 'changed'

    if (record.pid !== undefined && this.probe.isAlive(record.pid)) {
      const gone = await this.probe.terminate(record.pid, this.killGraceMs)
      if (!gone) {
        logger.error({ sessionId: record.sessionId, pid: record.pid }, 'lease_stale_holder_unkillable')
        return 'unkillable'
      }
    }

    const removed = await this.store.compareAndSwap(LEASE, revision, null)
    if (!removed) return 'changed'

    logger.warn(
      {
        sessionId: record.sessionId,
        health: inspection.health,
        lastHeartbeatAt: record.lastHeartbeatAt,
      },
      'lease_reaped',
    )
    return 'cleared'
  }

  /** Record the launched worker's pid on a lease this session holds. */
  async attachProcess(sessionId: string, pid: number): Promise<boolean> {
    return this.update(sessionId, (record) => ({
      ...record,
      pid,
      lastHeartbeatAt: epochSeconds(this.now()),
    }))
  }

  /** Refresh liveness. Writes at most once per second. */
  async heartbeat(sessionId: string): Promise<boolean> {
    const nowSec = epochSeconds(this.now())
    return this.update(sessionId, (record) =>
      record.lastHeartbeatAt >= nowSec ? null : { ...record, lastHeartbeatAt: nowSec },
    )
  }

  async release(sessionId: string): Promise<boolean> {
    const current = await this.store.read(LEASE)
    if (!current || current.value.sessionId !== sessionId) return false
    const released = await this.store.compareAndSwap(LEASE, current.revision, null)
    if (released) {
      logger.info({ sessionId }, 'lease_released')
    }
    return released
  }

  /**
   * Terminate the holder (SIGTERM, grace, SIGKILL) and delete the lease.
   * If the holder survives, the lease stays and false is returned so no
   * second worker can start next to it.
   */
  async forceClear(): Promise<boolean> {
    const current = await this.store.read(LEASE)
    if (!current) return true

    const { pid, sessionId } = current.value
    if (pid !== undefined && this.probe.isAlive(pid)) {
      const gone = await this.probe.terminate(pid, this.killGraceMs)
      if (!gone) {
        logger.error({ sessionId, pid }, 'lease_force_clear_kill_failed')
        return false
      }
    }

    await this.store.delete(LEASE)
    logger.info({ sessionId, pid }, 'lease_force_cleared')
    return true
  }

  // ---- Internal ----

  private classify(record: LeaseRecord): LeaseHealth {
    const pid = record.pid ?? record.ownerPid
    if (pid !== undefined && !this.probe.isAlive(pid)) return 'orphaned'
    const ageMs = this.now() - record.lastHeartbeatAt * 1000
    return ageMs >= this.stalenessMs ? 'stale' : 'live'
  }

  /** CAS update of a lease held by `sessionId`. `change` returning null means no write needed. */
  private async update(
    sessionId: string,
    change: (record: LeaseRecord) => LeaseRecord | null,
  ): Promise<boolean> {
    for (let attempt = 0; attempt < 3; attempt++) {
      const current = await this.store.read(LEASE)
      if (!current || current.value.sessionId !== sessionId) return false
      const next = change(current.value)
      if (!next) return true
      if (await this.store.compareAndSwap(LEASE, current.revision, next)) return true
    }
    logger.warn({ sessionId }, 'lease_update_contended')
    return false
  }
}
