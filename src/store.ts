/**
 * Lodestore Store
 * ===============
 *
 * The single writer of an application state tree.
 *
 * Events are admitted in `dispatch` order (after an optional, possibly
 * asynchronous filter) into one FIFO queue drained by one consumer loop.
 * For each event the loop, strictly before taking the next one:
 *
 *   1. folds the reducer pipeline over the current state,
 *   2. publishes the result as the new current state,
 *   3. asks the persistence coordinator to save it if the event persists,
 *   4. awaits the effects handler,
 *   5. notifies listeners,
 *   6. counts the event as processed.
 *
 * Every stage is guarded: a throwing reducer skips its event with the state
 * left as it was, a throwing effect or listener is reported and the rest of
 * the pass continues. Errors go to the logger and the `onError` hook.
 */

import { randomUUID } from 'node:crypto'
import { setTimeout as sleep } from 'node:timers/promises'
import {
  deepFreeze,
  enqueue,
  stateRestoreEvent,
  StateHolder,
  type AppEvent,
  type AppState,
  type EnqueuedEvent,
  type PersistentState,
  type StateListener
} from './core'
import type { KeyValueBackend } from './backends'
import type { PersistenceCodec } from './codec'
import { DEFAULT_IDLE_TIMEOUT_MS, resolveStoreSettings } from './config'
import { EffectsCoordinator, type EffectsHandler } from './effects'
import type { EqualityFn } from './equality'
import { EffectError, FilterError, ListenerError, ReducerError, StoreClosedError, type LodestoreError } from './errors'
import { createLifecycle, type Lifecycle, type LifecyclePhase } from './lifecycle'
import { ListenerRegistry } from './listeners'
import { createLogger, type Logger } from './logger'
import { PersistenceCoordinator } from './persistence'
import { EventQueue } from './queue'
import { ReducerPipeline, type ReducerLike } from './reducers'

// =============================================================================
// TYPES
// =============================================================================

/** Decides whether an event is admitted. May be asynchronous. */
export type DispatchFilter = (event: AppEvent) => boolean | Promise<boolean>

export type StoreErrorHandler = (error: LodestoreError, enqueued?: EnqueuedEvent) => void

export interface StoreOptions<P extends PersistentState, T> {
  /** Factory for the initial state; also used by the reset event. */
  defaultState: () => AppState<P, T>
  /** Enables persistence of the persistent slice under this key. Requires `backend` and `codec`. */
  persistenceKey?: string
  /** Where the persistent slice is stored. Use `MemoryBackend` for state that need not outlive the process. */
  backend?: KeyValueBackend
  codec?: PersistenceCodec<P>
  dispatchFilter?: DispatchFilter
  effects?: EffectsHandler<P, T>
  /** Installed before the initial restore event is processed. */
  reducers?: ReducerLike<AppState<P, T>>[]
  /** Debounce window for saves. Defaults to 500 ms or `LODESTORE_SAVE_DELAY_MS`. */
  saveDelayMs?: number
  /** Equality used to skip redundant writes. */
  isEqual?: EqualityFn
  logger?: Logger
  onError?: StoreErrorHandler
}

// =============================================================================
// STORE
// =============================================================================

export class Store<P extends PersistentState, T> {
  readonly id = randomUUID()

  private current: AppState<P, T>
  private readonly pipeline: ReducerPipeline<P, T>
  private readonly persistence: PersistenceCoordinator<P> | undefined
  private readonly effects = new EffectsCoordinator<P, T>()
  private readonly listeners: ListenerRegistry<P, T>
  private readonly queue = new EventQueue<EnqueuedEvent>()
  private readonly lifecycleService: Lifecycle
  private readonly logger: Logger
  private readonly onError: StoreErrorHandler | undefined

  private dispatchFilter: DispatchFilter | undefined
  private dispatched = 0
  private processed = 0
  private sequence = 0
  private pendingAdmissions = 0
  private admissionTail: Promise<void> = Promise.resolve()
  private idleWaiters: (() => void)[] = []
  private loop: Promise<void> = Promise.resolve()
  private closing: Promise<void> | undefined

  /**
   * Creates a store and resolves once the persisted slice (if any) has been
   * loaded and the internal restore event has gone through the pipeline.
   *
   * @throws ConfigError when the options are invalid.
   */
  static async create<P extends PersistentState, T>(options: StoreOptions<P, T>): Promise<Store<P, T>> {
    const store = new Store(options)
    await store.initialize()
    return store
  }

  private constructor(options: StoreOptions<P, T>) {
    const settings = resolveStoreSettings({
      persistenceKey: options.persistenceKey,
      saveDelayMs: options.saveDelayMs,
      hasCodec: options.codec !== undefined,
      hasBackend: options.backend !== undefined
    })

    this.logger = (options.logger ?? createLogger()).child({ store: this.id })
    this.onError = options.onError
    this.dispatchFilter = options.dispatchFilter
    this.lifecycleService = createLifecycle((from, to) => {
      this.logger.info({ from, to }, 'store lifecycle changed')
    })
    this.lifecycleService.send('init')

    this.pipeline = new ReducerPipeline(options.defaultState)
    for (const reducer of options.reducers ?? []) {
      this.pipeline.addReducer(reducer)
    }
    this.effects.setEffects(options.effects)
    this.listeners = new ListenerRegistry(this.logger)

    if (settings.persistenceKey !== undefined && options.codec && options.backend) {
      this.persistence = new PersistenceCoordinator({
        key: settings.persistenceKey,
        backend: options.backend,
        codec: options.codec,
        delayMs: settings.saveDelayMs,
        isEqual: options.isEqual,
        logger: this.logger
      })
    }

    const defaults = options.defaultState()
    const restored = this.persistence?.loadInitialState()
    this.current = deepFreeze(restored === undefined ? defaults : { ...defaults, persistent: restored })
  }

  private async initialize(): Promise<void> {
    // The initial slice takes the same path as live events before the loop starts
    this.dispatched++
    await this.process(enqueue(stateRestoreEvent(this.current.persistent), ++this.sequence))

    this.loop = this.consume()
    this.lifecycleService.send('ready')
  }

  // ---------------------------------------------------------------------------
  // Read surface
  // ---------------------------------------------------------------------------

  /**
   * The latest published state. Never blocks and never observes a partial
   * update. Published states are deep-frozen; derive a new state through an
   * event instead of changing this one.
   */
  getState(): AppState<P, T> {
    return this.current
  }

  get lifecycle(): LifecyclePhase {
    return this.lifecycleService.phase
  }

  /** Events admitted to the queue, including the initial restore event. */
  get eventsDispatched(): number {
    return this.dispatched
  }

  get eventsProcessed(): number {
    return this.processed
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  get isIdle(): boolean {
    return this.pendingAdmissions === 0 && this.dispatched === this.processed
  }

  // ---------------------------------------------------------------------------
  // Configuration surface
  // ---------------------------------------------------------------------------

  addReducer(reducer: ReducerLike<AppState<P, T>>): void {
    this.pipeline.addReducer(reducer)
  }

  /** Installs the effects handler, replacing the previous one. */
  setEffects(effects: EffectsHandler<P, T> | undefined): void {
    this.effects.setEffects(effects)
  }

  setDispatchFilter(filter: DispatchFilter | undefined): void {
    this.dispatchFilter = filter
  }

  /**
   * Registers a listener and immediately delivers the current state to it.
   * @returns The registration id.
   */
  addListener(listener: StateListener<P, T>): number {
    const id = this.listeners.addListener(listener)
    try {
      listener.updateState(new StateHolder(this.current))
    } catch (cause) {
      this.report(new ListenerError(id, { cause }))
    }
    return id
  }

  // ---------------------------------------------------------------------------
  // Dispatch surface
  // ---------------------------------------------------------------------------

  /**
   * Submits an event without waiting for it. Completion is observable through
   * listeners, effects and the counters.
   */
  dispatch(event: AppEvent, bypassFilter = false): void {
    this.admit(event, bypassFilter).catch((error: unknown) => {
      this.logger.error({ err: error, event: event.type }, 'admission failed')
    })
  }

  /**
   * Submits an event and resolves once it is queued (`true`) or dropped by
   * the filter or a closed store (`false`). Admission follows call order.
   */
  admit(event: AppEvent, bypassFilter = false): Promise<boolean> {
    if (this.closing) {
      this.report(new StoreClosedError(this.id), undefined, event)
      return Promise.resolve(false)
    }

    const filter = bypassFilter ? undefined : this.dispatchFilter
    if (!filter && this.pendingAdmissions === 0) {
      this.push(event)
      return Promise.resolve(true)
    }

    this.pendingAdmissions++
    const admission = this.admissionTail.then(() => this.runAdmission(event, filter))
    this.admissionTail = admission.then(() => undefined)
    return admission
  }

  private async runAdmission(event: AppEvent, filter: DispatchFilter | undefined): Promise<boolean> {
    try {
      if (filter && !(await this.runFilter(filter, event))) {
        this.logger.debug({ event: event.type }, 'event filtered out')
        return false
      }
      this.push(event)
      return true
    } finally {
      this.pendingAdmissions--
      this.checkIdle()
    }
  }

  private async runFilter(filter: DispatchFilter, event: AppEvent): Promise<boolean> {
    try {
      return await filter(event)
    } catch (cause) {
      this.report(new FilterError(event.type, { cause }))
      return false
    }
  }

  private push(event: AppEvent): void {
    this.dispatched++
    this.queue.push(enqueue(event, ++this.sequence))
  }

  // ---------------------------------------------------------------------------
  // Processing loop
  // ---------------------------------------------------------------------------

  private async consume(): Promise<void> {
    for await (const enqueued of this.queue) {
      await this.process(enqueued)
    }
  }

  private async process(enqueued: EnqueuedEvent): Promise<void> {
    const { event } = enqueued

    let next: AppState<P, T>
    try {
      next = this.pipeline.process(this.current, enqueued)
    } catch (cause) {
      this.report(new ReducerError(event.type, { cause }), enqueued)
      this.markProcessed()
      return
    }

    this.current = deepFreeze(next)
    this.persistence?.saveIfNeeded(next.persistent, event)

    try {
      await this.effects.executeEffects(event, next)
    } catch (cause) {
      this.report(new EffectError(event.type, { cause }), enqueued)
    }

    this.listeners.notifyListeners(new StateHolder(next), error => this.report(error, enqueued))
    this.logger.trace({ event: event.type, sequence: enqueued.sequence }, 'event processed')
    this.markProcessed()
  }

  private markProcessed(): void {
    this.processed++
    this.checkIdle()
  }

  private report(error: LodestoreError, enqueued?: EnqueuedEvent, event: AppEvent | undefined = enqueued?.event): void {
    this.logger.error({ err: error, event: event?.type, sequence: enqueued?.sequence }, error.message)
    if (!this.onError) return
    try {
      this.onError(error, enqueued)
    } catch (hookError) {
      this.logger.error({ err: hookError }, 'onError hook failed')
    }
  }

  // ---------------------------------------------------------------------------
  // Synchronisation
  // ---------------------------------------------------------------------------

  /** Resolves once every admitted event has been processed. */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve()
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  /**
   * Polls every 5 ms until dispatched and processed counts match or the
   * timeout elapses. Test aid; prefer `whenIdle`.
   *
   * @returns Whether the store became idle in time.
   */
  async debugWaitForEventsProcessed(timeoutMs = DEFAULT_IDLE_TIMEOUT_MS): Promise<boolean> {
    const start = performance.now()
    while (!this.isIdle && performance.now() - start < timeoutMs) {
      await sleep(5)
    }
    return this.isIdle
  }

  private checkIdle(): void {
    if (!this.isIdle || this.idleWaiters.length === 0) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /** Writes the current persistent slice now. `false` when nothing was written. */
  saveImmediately(): boolean {
    return this.persistence?.saveImmediately(this.current.persistent) ?? false
  }

  /** Resolves once the currently waiting debounced save has completed. */
  flushPendingSaves(): Promise<void> {
    return this.persistence?.flushPendingSaves() ?? Promise.resolve()
  }

  /** Successful writes to the backend, `0` without persistence. */
  get persistedWrites(): number {
    return this.persistence?.writes ?? 0
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  /**
   * Stops admitting events, processes what is already admitted, completes a
   * waiting save and moves the lifecycle to `closed`. Idempotent.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown()
    return this.closing
  }

  private async shutdown(): Promise<void> {
    await this.admissionTail
    this.queue.close()
    await this.loop
    await this.flushPendingSaves()
    this.lifecycleService.send('close')
  }
}

/**
 * Creates a store. Resolves once initialization, including the restore of a
 * persisted slice, has completed.
 *
 * @example
 * ```ts
 * const store = await createStore({
 *   defaultState: () => ({ persistent: { version: 1, counter: 0 }, transient: emptyTransient }),
 *   persistenceKey: 'settings',
 *   backend: new FileBackend('./data'),
 *   codec: createSchemaCodec(SettingsSchema),
 *   reducers: [counterReducer]
 * })
 * store.dispatch(increment())
 * ```
 */
export function createStore<P extends PersistentState, T>(options: StoreOptions<P, T>): Promise<Store<P, T>> {
  return Store.create(options)
}
