import { join, resolve } from 'node:path'

/**
 * Data directory holding the message database, state files, logs and
 * channel spools. Relative values resolve against the working directory.
 */
export const DATA_DIR = resolve(process.env.LEASH_HOME ?? 'data')

export interface DataPaths {
  root: string
  configFile: string
  dbFile: string
  stateDir: string
  logDir: string
  sessionsDir: string
  spoolDir: string
}

export function dataPaths(root: string = DATA_DIR): DataPaths {
  return {
    root,
    configFile: join(root, 'config.json'),
    dbFile: join(root, 'leash.db'),
    stateDir: join(root, 'state'),
    logDir: join(root, 'logs'),
    sessionsDir: join(root, 'sessions'),
    spoolDir: join(root, 'spool'),
  }
}
