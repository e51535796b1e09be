import type { SupervisorState } from '@leash/shared'

// ---------- Actions ----------

export type SupervisorAction =
  | { type: 'MESSAGES_PENDING' }
  | { type: 'LEASE_HELD' }
  | { type: 'NOTHING_TO_RUN' }
  | { type: 'LAUNCHED'; sessionId: string }
  | { type: 'LAUNCH_FAILED'; error: string }
  | { type: 'WORKER_OBSERVED'; sessionId: string }
  | { type: 'INTERRUPT_REQUESTED' }
  | { type: 'INTERRUPTED' }
  | { type: 'INTERRUPT_FAILED' }
  | { type: 'WORKER_EXITED' }
  | { type: 'ORPHAN_DETECTED' }
  | { type: 'RECOVERED' }

// ---------- Reducer ----------

const TRANSITIONS: Record<SupervisorAction['type'], readonly [SupervisorState, SupervisorState]> = {
  MESSAGES_PENDING: ['IDLE', 'ACQUIRING'],
  LEASE_HELD: ['ACQUIRING', 'IDLE'],
  // Another process handled the backlog between our read and our acquire
  NOTHING_TO_RUN: ['ACQUIRING', 'IDLE'],
  LAUNCHED: ['ACQUIRING', 'RUNNING'],
  LAUNCH_FAILED: ['ACQUIRING', 'IDLE'],
  // A live lease seen from idle: the worker belongs to another process or outlived a restart
  WORKER_OBSERVED: ['IDLE', 'RUNNING'],
  INTERRUPT_REQUESTED: ['RUNNING', 'INTERRUPTING'],
  INTERRUPTED: ['INTERRUPTING', 'IDLE'],
  // Holder survived SIGKILL; the lease stays
  INTERRUPT_FAILED: ['INTERRUPTING', 'RUNNING'],
  WORKER_EXITED: ['RUNNING', 'IDLE'],
  ORPHAN_DETECTED: ['IDLE', 'RECOVERING'],
  RECOVERED: ['RECOVERING', 'IDLE'],
}

export function transition(state: SupervisorState, action: SupervisorAction): SupervisorState {
  const [from, to] = TRANSITIONS[action.type]
  if (state !== from) {
    throw new Error(`Invalid supervisor transition ${action.type} from ${state}`)
  }
  return to
}

export function canTransition(state: SupervisorState, action: SupervisorAction['type']): boolean {
  return TRANSITIONS[action][0] === state
}
