import { logger } from '@/logger'
import { sleep } from './async'

export interface SupervisedTaskOptions {
  restartDelayMs: number
  signal: AbortSignal
}

/**
 * Run `task` until `signal` aborts, restarting it after `restartDelayMs`
 * whenever it throws or returns early. Failures stay inside this loop.
 */
export async function runSupervised(
  name: string,
  task: (signal: AbortSignal) => Promise<void>,
  options: SupervisedTaskOptions,
): Promise<void> {
  let restarts = 0
  while (!options.signal.aborted) {
    try {
      await task(options.signal)
      if (options.signal.aborted) break
      logger.warn({ task: name, restarts }, 'supervised_task_exited')
    } catch (err) {
      if (options.signal.aborted) break
      logger.error({ task: name, restarts, err }, 'supervised_task_crashed')
    }
    restarts++
    await sleep(options.restartDelayMs, options.signal)
  }
}
