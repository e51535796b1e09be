import { logger } from '@/logger'
import { hasErrorCode, sleep } from '@/utils/async'

const EXIT_POLL_MS = 50

/**
 * Whether a process with this pid exists. EPERM means it exists but
 * belongs to another user.
 */
export function isPidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return hasErrorCode(err, 'EPERM')
  }
}

/** Signal the process group when the pid leads one, else the process. */
export function signalProcess(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal)
    return true
  } catch {
    // not a group leader (or already gone)
  }
  try {
    process.kill(pid, signal)
    return true
  } catch (err) {
    if (hasErrorCode(err, 'ESRCH')) return false
    throw err
  }
}

export async function waitForPidExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs
  while (isPidAlive(pid)) {
    if (Date.now() >= deadline) return false
    await sleep(EXIT_POLL_MS)
  }
  return true
}

/**
 * SIGTERM, wait `graceMs`, SIGKILL, wait briefly. Returns whether the
 * process is gone. Used for workers this process did not spawn.
 */
export async function terminatePid(pid: number, graceMs: number): Promise<boolean> {
  if (!isPidAlive(pid)) return true

  signalProcess(pid, 'SIGTERM')
  if (await waitForPidExit(pid, graceMs)) return true

  logger.warn({ pid, graceMs }, 'process_sigterm_ignored_escalating')
  signalProcess(pid, 'SIGKILL')
  return waitForPidExit(pid, Math.max(graceMs, 1_000))
}
