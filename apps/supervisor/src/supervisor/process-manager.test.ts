import { spawn } from 'node:child_process'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ProcessManager } from './process-manager'

// ---------- Helpers ----------

/** A real child that idles until killed */
function spawnIdle() {
  return spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' })
}

/** A child that ignores SIGTERM */
function spawnStubborn() {
  return spawn(
    process.execPath,
    ['-e', "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"],
    { stdio: 'ignore' },
  )
}

/** A child that exits immediately with the given code */
function spawnExit(code = 0) {
  return spawn(process.execPath, ['-e', `process.exit(${code})`], { stdio: 'ignore' })
}

interface TestMeta {
  label: string
}

function createPM(opts?: ConstructorParameters<typeof ProcessManager<TestMeta>>[1]) {
  return new ProcessManager<TestMeta>('test', {
    autoCleanupDelayMs: 0,
    killTimeoutMs: 1000,
    ...opts,
  })
}

// ---------- Tests ----------

describe('ProcessManager', () => {
  let pm: ProcessManager<TestMeta>

  beforeEach(() => {
    pm = createPM()
  })

  afterEach(async () => {
    await pm.dispose()
  })

  // ---- Registration ----

  describe('register', () => {
    it('registers a running process and returns entry', () => {
      const child = spawnIdle()
      const entry = pm.register('a', child, { label: 'test' })
      expect(entry.id).toBe('a')
      expect(entry.state).toBe('running')
      expect(entry.pid).toBe(child.pid)
      expect(entry.meta.label).toBe('test')
      expect(pm.get('a')).toBe(entry)
      expect(pm.isAlive('a')).toBe(true)
    })

    it('rejects duplicate ID', () => {
      pm.register('a', spawnIdle(), { label: 'test' })
      const dup = spawnIdle()
      expect(() => pm.register('a', dup, { label: 'dup' })).toThrow('already registered')
      dup.kill('SIGKILL')
    })

    it('rejects when concurrency limit reached', async () => {
      const pm2 = createPM({ maxConcurrent: 1 })
      pm2.register('a', spawnIdle(), { label: 'first' })
      const second = spawnIdle()
      expect(() => pm2.register('b', second, { label: 'second' })).toThrow('Concurrency limit')
      second.kill('SIGKILL')
      await pm2.dispose()
    })

    it('allows registration once the running process has exited', async () => {
      const pm2 = createPM({ maxConcurrent: 1 })
      const first = pm2.register('a', spawnExit(0), { label: 'first' })
      await first.exited
      await Promise.resolve()
      const entry = pm2.register('b', spawnIdle(), { label: 'second' })
      expect(entry.id).toBe('b')
      await pm2.dispose()
    })

    it('finds entries by pid', () => {
      const child = spawnIdle()
      pm.register('a', child, { label: 'test' })
      expect(child.pid).toBeDefined()
      expect(pm.findByPid(child.pid ?? -1)?.id).toBe('a')
      expect(pm.findByPid(-1)).toBeUndefined()
    })
  })

  // ---- Exit monitoring ----

  describe('exit monitoring', () => {
    it('marks completed on exit code 0', async () => {
      const entry = pm.register('a', spawnExit(0), { label: 'test' })
      expect(await entry.exited).toBe(0)
      await Promise.resolve()
      expect(pm.get('a')?.state).toBe('completed')
      expect(pm.get('a')?.exitCode).toBe(0)
      expect(pm.get('a')?.finishedAt).toBeInstanceOf(Date)
      expect(pm.isAlive('a')).toBe(false)
    })

    it('marks failed on non-zero exit', async () => {
      const entry = pm.register('a', spawnExit(3), { label: 'test' })
      expect(await entry.exited).toBe(3)
      await Promise.resolve()
      expect(pm.get('a')?.state).toBe('failed')
    })

    it('invokes exit handlers with the code', async () => {
      const codes: number[] = []
      pm.onExit((_entry, code) => codes.push(code))
      const entry = pm.register('a', spawnExit(2), { label: 'test' })
      await entry.exited
      await Promise.resolve()
      expect(codes).toEqual([2])
    })

    it('unsubscribed handlers are not called', async () => {
      const codes: number[] = []
      const off = pm.onExit((_entry, code) => codes.push(code))
      off()
      const entry = pm.register('a', spawnExit(0), { label: 'test' })
      await entry.exited
      await Promise.resolve()
      expect(codes).toEqual([])
    })
  })

  // ---- Termination ----

  describe('terminate', () => {
    it('terminates a running process', async () => {
      pm.register('a', spawnIdle(), { label: 'test' })
      expect(pm.isAlive('a')).toBe(true)
      const exited = await pm.terminate('a')
      expect(exited).toBe(true)
      expect(pm.get('a')?.state).toBe('cancelled')
      expect(pm.get('a')?.finishedAt).toBeInstanceOf(Date)
      expect(pm.isAlive('a')).toBe(false)
    })

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      const entry = pm.register('a', spawnStubborn(), { label: 'test' })
      // give the child time to install its SIGTERM handler
      await new Promise((resolve) => setTimeout(resolve, 300))
      const started = Date.now()
      expect(await pm.terminate('a', 200)).toBe(true)
      expect(Date.now() - started).toBeGreaterThanOrEqual(150)
      expect(await entry.exited).toBe(137)
    })

    it('terminate on unknown id resolves true', async () => {
      expect(await pm.terminate('missing')).toBe(true)
    })

    it('terminate after exit is a no-op', async () => {
      const entry = pm.register('a', spawnExit(0), { label: 'test' })
      await entry.exited
      await Promise.resolve()
      expect(await pm.terminate('a')).toBe(true)
      expect(pm.get('a')?.state).toBe('completed')
    })
  })
})
