import { type ChildProcess, spawn } from 'node:child_process'
import { closeSync, openSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { WorkerInput } from '@leash/shared'
import type { LeashConfig } from '@/config'
import { logger } from '@/logger'
import type { DataPaths } from '@/root'
import { CommandBuilder } from './command'
import { safeEnv } from './safe-env'

// ---------- Types ----------

export interface LaunchedWorker {
  child: ChildProcess
  pid: number
  logFile: string
  inputFile: string
}

/** Starts the worker for one session. Rejects when the process did not start. */
export interface Launcher {
  launch: (input: WorkerInput) => Promise<LaunchedWorker>
}

// ---------- Prompt ----------

/**
 * Prompt handed to the worker: structured context about how the last
 * session ended (never replayed as a user message), then the instruction.
 */
export function renderPrompt(input: WorkerInput): string {
  const context: string[] = []

  if (input.crash) {
    context.push(
      `The previous session stopped unexpectedly while working on this task ` +
        `(started ${input.crash.startedAt}):\n${input.crash.instruction}`,
    )
  }
  if (input.interrupt) {
    context.push(
      `The user stopped the previous task at ${input.interrupt.interruptedAt}. ` +
        `Do not continue it unless asked:\n${input.interrupt.previousInstruction}`,
    )
  }
  if (input.remaining.length > 0) {
    context.push(`${input.remaining.length} more task(s) are queued after this one.`)
  }

  const header = context.length > 0 ? `[session context]\n${context.join('\n\n')}\n\n` : ''
  return `${header}[chat ${input.task.chatId}]\n${input.task.instruction}`
}

// ---------- WorkerLauncher ----------

export class WorkerLauncher implements Launcher {
  constructor(
    private readonly config: LeashConfig['worker'],
    private readonly paths: DataPaths,
  ) {}

  async launch(input: WorkerInput): Promise<LaunchedWorker> {
    const sessionDir = join(this.paths.sessionsDir, input.sessionId)
    await mkdir(sessionDir, { recursive: true })
    await mkdir(this.paths.logDir, { recursive: true })

    const inputFile = join(sessionDir, 'input.json')
    await writeFile(inputFile, `${JSON.stringify(input, null, 2)}\n`)

    const logFile = join(this.paths.logDir, `worker-${input.sessionId}.log`)
    const command = await CommandBuilder.create(this.config.command)
      .template(this.config.args, {
        prompt: renderPrompt(input),
        session: input.sessionId,
        chat: input.task.chatId,
        input: inputFile,
      })
      .envs(
        safeEnv({
          ...this.config.env,
          LEASH_HOME: this.paths.root,
          LEASH_SESSION_ID: input.sessionId,
          LEASH_CHAT_ID: input.task.chatId,
          LEASH_CHANNEL_ID: input.task.channelId,
          LEASH_INPUT: inputFile,
        }),
      )
      .cwd(this.config.cwd)
      .resolve()

    // The worker writes straight to its log file so it does not depend on
    // this process staying alive to drain a pipe.
    const out = openSync(logFile, 'a')
    let child: ChildProcess
    try {
      child = spawn(command.resolvedPath, command.args, {
        cwd: command.cwd,
        env: command.env,
        detached: true,
        stdio: ['ignore', out, out],
      })
    } finally {
      closeSync(out)
    }

    const pid = await new Promise<number>((resolve, reject) => {
      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new Error('Worker started without a pid'))
        } else {
          resolve(child.pid)
        }
      })
      child.once('error', reject)
    })

    logger.info(
      { sessionId: input.sessionId, pid, program: command.program, logFile },
      'worker_launched',
    )
    return { child, pid, logFile, inputFile }
  }
}
