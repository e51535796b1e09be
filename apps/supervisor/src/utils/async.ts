import { setTimeout as delay } from 'node:timers/promises'

/** Resolves after `ms`, or early (without throwing) when `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return
  try {
    await delay(ms, undefined, { signal })
  } catch (err) {
    if (signal?.aborted) return
    throw err
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code
}

/** Current time in epoch seconds. */
export function epochSeconds(nowMs: number = Date.now()): number {
  return Math.floor(nowMs / 1000)
}
