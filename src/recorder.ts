/**
 * Event recording and timed replay for debugging.
 *
 * Install `recorder.dispatchFilter` as a store's dispatch filter to capture
 * every admitted event with its wall-clock time. `replay` re-dispatches the
 * captured events in order, waiting the original gap between consecutive
 * events. While a replay runs the filter rejects live events; replayed
 * events sent to the same store must therefore bypass the filter.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { defineEvent, type AppEvent } from './core'
import { createLogger, type Logger } from './logger'

/** Sentinel that ends a replay when met in the recorded stream. */
export const replayEvent = defineEvent('@@lodestore/replay')

export interface RecordedEvent {
  readonly event: AppEvent
  /** Wall-clock milliseconds. */
  readonly recordedAt: number
}

export type ReplayDispatch = (event: AppEvent, isLast: boolean) => void | Promise<void>

export interface EventRecorderOptions {
  /** Defaults to `Date.now`. */
  clock?: () => number
  /** Defaults to a timer-based sleep. */
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

export class EventRecorder {
  private events: RecordedEvent[] = []
  private replaying = false
  private readonly clock: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly logger: Logger

  constructor(options: EventRecorderOptions = {}) {
    this.clock = options.clock ?? Date.now
    this.sleep = options.sleep ?? (ms => delay(ms))
    this.logger = (options.logger ?? createLogger()).child({ component: 'recorder' })
  }

  get size(): number {
    return this.events.length
  }

  get isReplaying(): boolean {
    return this.replaying
  }

  record(event: AppEvent): void {
    this.events.push({ event, recordedAt: this.clock() })
  }

  /** Returns the recorded events and empties the buffer. */
  getAndClear(): RecordedEvent[] {
    const drained = this.events
    this.events = []
    return drained
  }

  clear(): void {
    this.events = []
  }

  /**
   * Dispatch filter: rejects everything while replaying, otherwise records
   * the event and admits it. Bound, so it can be passed as is.
   */
  readonly dispatchFilter = (event: AppEvent): boolean => {
    if (this.replaying) return false
    this.record(event)
    return true
  }

  /**
   * Drains the buffer and re-dispatches its events with their original
   * spacing. Stops at the first {@link replayEvent}.
   *
   * @returns The number of events dispatched.
   */
  async replay(dispatch: ReplayDispatch): Promise<number> {
    const recorded = this.getAndClear()
    const sentinel = recorded.findIndex(({ event }) => replayEvent.match(event))
    const toReplay = sentinel === -1 ? recorded : recorded.slice(0, sentinel)

    this.replaying = true
    this.logger.info({ events: toReplay.length }, 'replay started')
    let dispatched = 0
    try {
      let previous = toReplay[0]?.recordedAt ?? 0
      for (const [index, { event, recordedAt }] of toReplay.entries()) {
        const gap = recordedAt - previous
        previous = recordedAt
        if (gap > 0) await this.sleep(gap)

        await dispatch(event, index === toReplay.length - 1)
        dispatched++
      }
    } finally {
      this.replaying = false
      this.logger.info({ dispatched }, 'replay finished')
    }
    return dispatched
  }
}
