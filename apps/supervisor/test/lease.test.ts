import { describe, expect, test } from 'vitest'
import { LeaseManager, type ProcessProbe } from '@/lease/lease-manager'
import { LEASE } from '@/store/state-keys'
import { FileStateStore } from '@/store/state-store'
import { makeTempDir } from './helpers'

const STALENESS_MS = 60_000

/** Probe over a fake process table. */
function fakeProbe(alive: Set<number>, unkillable = new Set<number>()) {
  const terminated: number[] = []
  const probe: ProcessProbe = {
    isAlive: (pid) => alive.has(pid),
    async terminate(pid) {
      terminated.push(pid)
      if (unkillable.has(pid)) return false
      alive.delete(pid)
      return true
    },
  }
  return { probe, terminated }
}

function setup(options: { alive?: number[]; unkillable?: number[] } = {}) {
  const store = new FileStateStore(makeTempDir('leash-lease-'))
  const alive = new Set([process.pid, ...(options.alive ?? [])])
  const { probe, terminated } = fakeProbe(alive, new Set(options.unkillable ?? []))
  const clock = { now: 1_700_000_000_000 }
  const create = () =>
    new LeaseManager(store, {
      stalenessMs: STALENESS_MS,
      killGraceMs: 10,
      probe,
      now: () => clock.now,
    })
  return { store, alive, terminated, clock, lease: create(), create }
}

describe('LeaseManager', () => {
  test('a free lease is acquired and reported live', async () => {
    const { lease } = setup()
    expect(await lease.inspect()).toEqual({ health: 'free', record: null, revision: null })

    expect(await lease.tryAcquire('s1')).toBe(true)
    const inspection = await lease.inspect()
    expect(inspection.health).toBe('live')
    expect(inspection.record).toEqual({
      sessionId: 's1',
      acquiredAt: 1_700_000_000,
      lastHeartbeatAt: 1_700_000_000,
      ownerPid: process.pid,
    })
  })

  test('a live lease is not acquired twice', async () => {
    const { lease } = setup()
    expect(await lease.tryAcquire('s1')).toBe(true)
    expect(await lease.tryAcquire('s2')).toBe(false)
    expect((await lease.current())?.sessionId).toBe('s1')
  })

  test('concurrent acquisitions from separate managers have exactly one winner', async () => {
    const { create } = setup()
    const managers = Array.from({ length: 12 }, create)
    const results = await Promise.all(managers.map((m, i) => m.tryAcquire(`s${i}`)))
    expect(results.filter(Boolean)).toHaveLength(1)
  })

  test('attachProcess records the worker pid', async () => {
    const { lease } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    expect(await lease.attachProcess('s1', 4242)).toBe(true)
    expect((await lease.current())?.pid).toBe(4242)
    expect(await lease.attachProcess('other', 4242)).toBe(false)
  })

  test('heartbeat refreshes liveness for the holder only', async () => {
    const { lease, clock } = setup()
    await lease.tryAcquire('s1')
    clock.now += 5_000

    expect(await lease.heartbeat('other')).toBe(false)
    expect(await lease.heartbeat('s1')).toBe(true)
    expect((await lease.current())?.lastHeartbeatAt).toBe(1_700_000_005)
  })

  test('a lease without heartbeats goes stale at the threshold', async () => {
    const { lease, clock } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)

    clock.now += STALENESS_MS - 1_000
    expect((await lease.inspect()).health).toBe('live')
    clock.now += 1_000
    expect((await lease.inspect()).health).toBe('stale')
  })

  test('a lease whose worker died is orphaned', async () => {
    const { lease, alive } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)
    alive.delete(4242)
    expect((await lease.inspect()).health).toBe('orphaned')
  })

  test('a reservation whose owner died is orphaned', async () => {
    const { store, lease } = setup()
    await store.write(LEASE, {
      sessionId: 's1',
      acquiredAt: 1_700_000_000,
      lastHeartbeatAt: 1_700_000_000,
      ownerPid: 31337,
    })
    expect((await lease.inspect()).health).toBe('orphaned')
  })

  test('an orphaned lease is replaced on acquire', async () => {
    const { lease, alive } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)
    alive.delete(4242)

    expect(await lease.tryAcquire('s2')).toBe(true)
    expect((await lease.current())?.sessionId).toBe('s2')
  })

  test('a stale holder is terminated before its lease is replaced', async () => {
    const { lease, clock, terminated, alive } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)
    clock.now += STALENESS_MS

    expect(await lease.tryAcquire('s2')).toBe(true)
    expect(terminated).toEqual([4242])
    expect(alive.has(4242)).toBe(false)
  })

  test('a stale holder that survives termination keeps the lease', async () => {
    const { lease, clock } = setup({ alive: [4242], unkillable: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)
    clock.now += STALENESS_MS

    expect(await lease.tryAcquire('s2')).toBe(false)
    expect((await lease.current())?.sessionId).toBe('s1')
  })

  test('release only removes a lease the session holds', async () => {
    const { lease } = setup()
    await lease.tryAcquire('s1')
    expect(await lease.release('other')).toBe(false)
    expect(await lease.release('s1')).toBe(true)
    expect((await lease.inspect()).health).toBe('free')
  })

  test('forceClear terminates the worker and deletes the lease', async () => {
    const { lease, terminated } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)

    expect(await lease.forceClear()).toBe(true)
    expect(terminated).toEqual([4242])
    expect(await lease.current()).toBeNull()
  })

  test('forceClear never signals the reserving owner', async () => {
    const { lease, terminated } = setup()
    await lease.tryAcquire('s1')
    expect(await lease.forceClear()).toBe(true)
    expect(terminated).toEqual([])
  })

  test('forceClear keeps the lease when the worker cannot be killed', async () => {
    const { lease } = setup({ alive: [4242], unkillable: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)

    expect(await lease.forceClear()).toBe(false)
    expect((await lease.current())?.sessionId).toBe('s1')
  })

  test('reap refuses to delete a lease that changed since inspection', async () => {
    const { lease, alive } = setup({ alive: [4242] })
    await lease.tryAcquire('s1')
    await lease.attachProcess('s1', 4242)
    alive.delete(4242)
    const inspection = await lease.inspect()

    await lease.release('s1')
    await lease.tryAcquire('s2')
    expect(await lease.reap(inspection)).toBe('changed')
    expect((await lease.current())?.sessionId).toBe('s2')
  })
})
