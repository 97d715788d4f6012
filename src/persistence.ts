/**
 * Lodestore Persistence Coordinator
 * =================================
 *
 * Debounced, single-writer persistence of the persistent slice.
 *
 * Saves requested by persisting events are delayed by a fixed window and
 * restarted by every newer request (trailing-edge debounce), so a burst of
 * updates produces exactly one write carrying the last value. Values equal
 * to the one already written, or to the one already waiting, are skipped.
 *
 * Failures never reach the caller: a value that cannot be decoded loads as
 * absent, and a failed write clears the pending marker so that an identical
 * later request is retried rather than skipped.
 */

import type { AppEvent } from './core'
import type { KeyValueBackend } from './backends'
import type { PersistenceCodec } from './codec'
import type { Logger } from './logger'
import { createLogger } from './logger'
import { DEFAULT_SAVE_DELAY_MS } from './config'
import { deepEqual, type EqualityFn } from './equality'
import { DecodeError, PersistenceError } from './errors'

export interface PersistenceCoordinatorOptions<P> {
  key: string
  backend: KeyValueBackend
  codec: PersistenceCodec<P>
  /** Debounce window in milliseconds. Defaults to 500. */
  delayMs?: number
  /** Equality used to skip redundant writes. Defaults to deep equality. */
  isEqual?: EqualityFn
  logger?: Logger
}

interface SaveTask<P> {
  readonly value: P
  readonly done: Promise<void>
  readonly settle: () => void
  timer: ReturnType<typeof setTimeout> | undefined
}

export class PersistenceCoordinator<P> {
  readonly key: string
  readonly delayMs: number

  private readonly backend: KeyValueBackend
  private readonly codec: PersistenceCodec<P>
  private readonly isEqual: EqualityFn
  private readonly logger: Logger

  private lastSaved: { value: P } | undefined
  private task: SaveTask<P> | undefined

  private writeCount = 0
  private failedWriteCount = 0

  constructor(options: PersistenceCoordinatorOptions<P>) {
    this.key = options.key
    this.backend = options.backend
    this.codec = options.codec
    this.delayMs = options.delayMs ?? DEFAULT_SAVE_DELAY_MS
    this.isEqual = options.isEqual ?? deepEqual
    this.logger = (options.logger ?? createLogger()).child({ component: 'persistence', key: options.key })
  }

  /** Successful writes, debounced or immediate. */
  get writes(): number {
    return this.writeCount
  }

  get failedWrites(): number {
    return this.failedWriteCount
  }

  get hasPendingSave(): boolean {
    return this.task !== undefined
  }

  /**
   * Reads the persisted slice. Missing, unreadable or undecodable data loads
   * as `undefined`. A loaded value counts as already written.
   */
  loadInitialState(): P | undefined {
    let bytes: Uint8Array | undefined
    try {
      bytes = this.backend.read(this.key)
    } catch (cause) {
      this.logger.warn({ err: cause }, 'persisted state could not be read; using defaults')
      return undefined
    }

    if (bytes === undefined) {
      this.logger.debug('no persisted state')
      return undefined
    }

    try {
      const value = this.codec.decode(bytes)
      this.lastSaved = { value }
      return value
    } catch (cause) {
      const error = new DecodeError(this.key, { cause })
      this.logger.warn({ err: error }, 'persisted state could not be decoded; using defaults')
      return undefined
    }
  }

  /**
   * Schedules a debounced write of `state` if `event` persists and the value
   * is new. A newer request replaces the waiting one and restarts the window.
   */
  saveIfNeeded(state: P, event: AppEvent): void {
    if (!event.persist) return

    if (this.task && this.isEqual(state, this.task.value)) {
      this.logger.debug({ event: event.type }, 'save skipped: value already pending')
      return
    }

    if (this.lastSaved && this.isEqual(state, this.lastSaved.value)) {
      // The stored bytes already hold this value; a different waiting value would overwrite it
      this.cancelPendingSave()
      this.logger.debug({ event: event.type }, 'save skipped: value already written')
      return
    }

    this.cancelPendingSave()
    this.task = this.schedule(state)
    this.logger.debug({ event: event.type, delayMs: this.delayMs }, 'save scheduled')
  }

  /**
   * Writes `state` now, bypassing the debounce window, unless it equals the
   * written or the waiting value. A waiting save of a different value is
   * cancelled so it cannot overwrite this one later.
   *
   * @returns Whether a write happened and succeeded.
   */
  saveImmediately(state: P): boolean {
    if (this.lastSaved && this.isEqual(state, this.lastSaved.value)) return false
    if (this.task && this.isEqual(state, this.task.value)) return false

    this.cancelPendingSave()
    return this.write(state)
  }

  /**
   * Resolves once the currently waiting save has completed or been
   * cancelled. Saves scheduled afterwards are not awaited.
   */
  flushPendingSaves(): Promise<void> {
    return this.task?.done ?? Promise.resolve()
  }

  /** Cancels a waiting save without writing it. */
  dispose(): void {
    this.cancelPendingSave()
  }

  private schedule(value: P): SaveTask<P> {
    let settle: () => void = () => {}
    const done = new Promise<void>(resolve => {
      settle = resolve
    })

    const task: SaveTask<P> = { value, done, settle, timer: undefined }
    task.timer = setTimeout(() => {
      task.timer = undefined
      if (this.task === task) this.task = undefined
      this.write(value)
      settle()
    }, this.delayMs)

    return task
  }

  private cancelPendingSave(): void {
    const task = this.task
    if (!task) return

    this.task = undefined
    if (task.timer !== undefined) clearTimeout(task.timer)
    task.timer = undefined
    task.settle()
  }

  private write(value: P): boolean {
    try {
      const bytes = this.codec.encode(value)
      this.backend.write(this.key, bytes)
    } catch (cause) {
      this.failedWriteCount++
      const error = new PersistenceError(this.key, { cause })
      this.logger.error({ err: error }, 'persisting state failed')
      return false
    }

    this.writeCount++
    this.lastSaved = { value }
    this.logger.debug({ writes: this.writeCount }, 'state written')
    return true
  }
}
