/**
 * Transient event log: a bounded list of processed events kept in the state
 * tree, a reducer maintaining it and an effects handler replaying it.
 */

import { defineEvent, type AppEvent, type AppState, type EnqueuedEvent, type PersistentState } from './core'
import type { EffectsHandler } from './effects'
import type { EventReducer } from './reducers'

export const DEFAULT_MAX_ENTRIES = 200
export const DEFAULT_REPLAY_DELAY_MS = 500

/** Empties the log. Not logged itself. */
export const eventLogClear = defineEvent('@@lodestore/event-log/clear')
/** Replays the logged events through the effects handler. Not logged itself. */
export const eventLogReplay = defineEvent('@@lodestore/event-log/replay')

export interface EventLogEntry {
  readonly sequence: number
  readonly enqueuedAt: number
  readonly type: string
  readonly persist: boolean
  readonly isUIEvent: boolean
  readonly event: AppEvent
}

export interface EventLogState {
  readonly entries: readonly EventLogEntry[]
}

export const emptyEventLog: EventLogState = Object.freeze({ entries: Object.freeze([]) })

function isEventLogControl(event: AppEvent): boolean {
  return eventLogClear.match(event) || eventLogReplay.match(event)
}

export function toEventLogEntry({ event, enqueuedAt, sequence }: EnqueuedEvent): EventLogEntry {
  return {
    sequence,
    enqueuedAt,
    type: event.type,
    persist: event.persist,
    isUIEvent: event.isUIEvent,
    event
  }
}

/**
 * Appends one entry per processed event, keeping the newest `maxEntries`.
 * Combine with `scopeReducer` to place the log inside the transient slice.
 */
export class EventLogReducer implements EventReducer<EventLogState> {
  readonly maxEntries: number

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
  }

  reduce(state: EventLogState, enqueued: EnqueuedEvent): EventLogState {
    if (eventLogClear.match(enqueued.event)) return emptyEventLog
    if (isEventLogControl(enqueued.event)) return state

    const entries = [...state.entries, toEventLogEntry(enqueued)]
    const overflow = entries.length - this.maxEntries
    return { entries: overflow > 0 ? entries.slice(overflow) : entries }
  }
}

export interface EventLogEffectsOptions<P extends PersistentState, T> {
  dispatch: (event: AppEvent) => void
  /** Reads the log from the state the effects handler receives. */
  readEntries: (state: AppState<P, T>) => readonly EventLogEntry[]
  delayMs?: number
  /** Defaults to `setTimeout`. */
  schedule?: (callback: () => void, ms: number) => void
}

/**
 * Effects handler that, on `eventLogReplay`, clears the log and then
 * re-dispatches the logged events one by one, `delayMs` apart. The replay
 * runs detached from the store loop.
 */
export function createEventLogEffects<P extends PersistentState, T>(
  options: EventLogEffectsOptions<P, T>
): EffectsHandler<P, T> {
  const delayMs = options.delayMs ?? DEFAULT_REPLAY_DELAY_MS
  const schedule = options.schedule ?? ((callback, ms) => {
    setTimeout(callback, ms)
  })

  return (event, state) => {
    if (!eventLogReplay.match(event)) return

    const events = options.readEntries(state).map(entry => entry.event)
    options.dispatch(eventLogClear())

    const step = (index: number): void => {
      if (index >= events.length) return
      schedule(() => {
        options.dispatch(events[index])
        step(index + 1)
      }, delayMs)
    }
    step(0)
  }
}
