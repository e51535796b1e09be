import { open, stat } from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'
import { logger } from '@/logger'
import { hasErrorCode, sleep } from '@/utils/async'
import { runSupervised } from '@/utils/supervised-task'

export interface OutputMirrorOptions {
  sessionId: string
  logFile: string
  /** Called whenever the worker wrote something */
  onActivity: () => Promise<void>
  pollIntervalMs: number
  restartDelayMs: number
}

const MAX_CHUNK_BYTES = 64 * 1024

/**
 * Tails the worker's log file into the structured log and turns output
 * growth into lease heartbeats. Runs beside the worker: stopping or
 * crashing the mirror never touches the worker process.
 */
export class OutputMirror {
  private offset = 0
  private partial = ''
  private decoder = new StringDecoder('utf8')
  private controller: AbortController | null = null
  private done: Promise<void> | null = null

  constructor(private readonly options: OutputMirrorOptions) {}

  start(): void {
    if (this.controller) return
    this.controller = new AbortController()
    this.done = runSupervised(
      `output-mirror:${this.options.sessionId}`,
      (signal) => this.tail(signal),
      { restartDelayMs: this.options.restartDelayMs, signal: this.controller.signal },
    )
  }

  async stop(): Promise<void> {
    this.controller?.abort()
    await this.done
    this.controller = null
    this.done = null
  }

  /** Read whatever was appended since the last call. Returns the byte count. */
  async drain(): Promise<number> {
    let size: number
    try {
      size = (await stat(this.options.logFile)).size
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return 0
      throw err
    }
    if (size < this.offset) {
      // truncated or replaced
      this.offset = 0
      this.partial = ''
      this.decoder = new StringDecoder('utf8')
    }
    if (size === this.offset) return 0

    const length = Math.min(size - this.offset, MAX_CHUNK_BYTES)
    const handle = await open(this.options.logFile, 'r')
    try {
      const buffer = Buffer.alloc(length)
      const { bytesRead } = await handle.read(buffer, 0, length, this.offset)
      this.offset += bytesRead
      this.forward(this.decoder.write(buffer.subarray(0, bytesRead)))
      return bytesRead
    } finally {
      await handle.close()
    }
  }

  private async tail(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const read = await this.drain()
      if (read > 0) {
        await this.options.onActivity()
        continue
      }
      await sleep(this.options.pollIntervalMs, signal)
    }
  }

  private forward(chunk: string): void {
    const lines = (this.partial + chunk).split('\n')
    this.partial = lines.pop() ?? ''
    for (const line of lines) {
      if (line.trim().length === 0) continue
      logger.debug({ sessionId: this.options.sessionId, line }, 'worker_output')
    }
  }
}
