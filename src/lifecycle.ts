/**
 * Store lifecycle as a robot3 state machine.
 *
 *   uninitialized --init--> initializing --ready--> running --close--> closed
 *
 * `initializing` covers loading the persisted slice and processing the
 * internal restore event; `closed` is entered by `Store.close()`.
 */

import { createMachine, interpret, state, transition } from 'robot3'

export type LifecyclePhase = 'uninitialized' | 'initializing' | 'running' | 'closed'

export type LifecycleEvent = 'init' | 'ready' | 'close'

const lifecycleMachine = createMachine('uninitialized', {
  uninitialized: state(transition('init', 'initializing'), transition('close', 'closed')),
  initializing: state(transition('ready', 'running'), transition('close', 'closed')),
  running: state(transition('close', 'closed')),
  closed: state()
})

const PHASES: readonly LifecyclePhase[] = ['uninitialized', 'initializing', 'running', 'closed']

function toPhase(name: string): LifecyclePhase {
  const phase = PHASES.find(candidate => candidate === name)
  if (!phase) throw new Error(`Unknown lifecycle state "${name}"`)
  return phase
}

export interface Lifecycle {
  readonly phase: LifecyclePhase
  /** Sends an event; events the current phase does not accept are ignored. */
  send(event: LifecycleEvent): LifecyclePhase
  is(...phases: LifecyclePhase[]): boolean
}

/**
 * Starts a lifecycle service. `onTransition` is called after every change of
 * phase with the previous and the new phase.
 */
export function createLifecycle(
  onTransition?: (from: LifecyclePhase, to: LifecyclePhase) => void
): Lifecycle {
  const service = interpret(lifecycleMachine, () => {})
  const current = (): LifecyclePhase => toPhase(String(service.machine.current))

  return {
    get phase() {
      return current()
    },
    send(event) {
      const from = current()
      service.send(event)
      const to = current()
      if (from !== to) onTransition?.(from, to)
      return to
    },
    is(...phases) {
      return phases.includes(current())
    }
  }
}
