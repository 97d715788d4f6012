/**
 * Lodestore Core Types
 * ====================
 *
 * The value types every other module speaks: events and their creators,
 * the lifecycle events the store handles itself, queued events, the
 * application state tree and the listener contract.
 */

// =============================================================================
// EVENTS
// =============================================================================

/**
 * Capability set shared by every event flowing through a store.
 *
 * `persist` asks the persistence coordinator to save the resulting state;
 * `isUIEvent` marks events that originate from user interaction.
 */
export interface AppEvent {
  readonly type: string
  readonly persist: boolean
  readonly isUIEvent: boolean
}

/**
 * Event produced by a creator from {@link defineEvent}.
 * @template TType The literal event type.
 * @template TPayload The payload type.
 */
export interface DefinedEvent<TType extends string, TPayload> extends AppEvent {
  readonly type: TType
  readonly payload: TPayload
}

/** Capability flags accepted by {@link defineEvent}. Both default to `false`. */
export interface EventFlags {
  persist?: boolean
  isUIEvent?: boolean
}

/**
 * Callable event creator with a type guard for reducers and effects.
 * A `void` payload lets the creator be called with no argument.
 */
export interface EventCreator<TType extends string, TPayload = void> {
  (payload: TPayload): DefinedEvent<TType, TPayload>
  readonly type: TType
  readonly persist: boolean
  readonly isUIEvent: boolean
  match(event: AppEvent): event is DefinedEvent<TType, TPayload>
}

/**
 * Declares an event type and returns its creator.
 *
 * @example
 * ```ts
 * const setCounter = defineEvent<'counter/set', number>('counter/set', { persist: true, isUIEvent: true })
 * store.dispatch(setCounter(3))
 * if (setCounter.match(event)) event.payload // number
 * ```
 */
export function defineEvent<TType extends string, TPayload = void>(
  type: TType,
  flags: EventFlags = {}
): EventCreator<TType, TPayload> {
  const persist = flags.persist ?? false
  const isUIEvent = flags.isUIEvent ?? false

  const create = (payload: TPayload): DefinedEvent<TType, TPayload> =>
    Object.freeze({ type, payload, persist, isUIEvent })

  return Object.assign(create, {
    type,
    persist,
    isUIEvent,
    match: (event: AppEvent): event is DefinedEvent<TType, TPayload> => event.type === type
  })
}

// =============================================================================
// LIFECYCLE EVENTS
// =============================================================================

export const RESET_EVENT_TYPE = '@@lodestore/reset' as const
export const STATE_RESTORE_EVENT_TYPE = '@@lodestore/restore' as const

/** Recomputes the whole state from the default-state factory. Persisted. */
export const resetEvent = defineEvent(RESET_EVENT_TYPE, { persist: true, isUIEvent: true })

export type ResetEvent = ReturnType<typeof resetEvent>

/** Overwrites the persistent slice with a loaded value, leaving the transient slice as is. */
export type StateRestoreEvent<P> = DefinedEvent<typeof STATE_RESTORE_EVENT_TYPE, P>

export function stateRestoreEvent<P>(restoredState: P): StateRestoreEvent<P> {
  return Object.freeze({
    type: STATE_RESTORE_EVENT_TYPE,
    payload: restoredState,
    persist: false,
    isUIEvent: false
  })
}

export function isResetEvent(event: AppEvent): event is ResetEvent {
  return event.type === RESET_EVENT_TYPE
}

/**
 * Narrows to a restore event. The payload type is the caller's claim; stores
 * only ever build restore events from their own persistent slice.
 */
export function isStateRestoreEvent<P>(event: AppEvent): event is StateRestoreEvent<P> {
  return event.type === STATE_RESTORE_EVENT_TYPE
}

export function isLifecycleEvent(event: AppEvent): boolean {
  return isResetEvent(event) || isStateRestoreEvent(event)
}

// =============================================================================
// QUEUED EVENTS
// =============================================================================

/**
 * An event as admitted to a store's queue. Immutable.
 * @template E The event type.
 */
export interface EnqueuedEvent<E extends AppEvent = AppEvent> {
  readonly event: E
  /** Monotonic admission time in milliseconds (`performance.now()`). */
  readonly enqueuedAt: number
  /** 1-based admission number within the owning store. */
  readonly sequence: number
}

export function enqueue<E extends AppEvent>(event: E, sequence: number): EnqueuedEvent<E> {
  return Object.freeze({ event, enqueuedAt: performance.now(), sequence })
}

// =============================================================================
// STATE
// =============================================================================

/**
 * Persistent slices declare their schema version for evolution across releases.
 */
export interface PersistentState {
  readonly version: number
}

/**
 * The complete application state: a persisted slice and an in-memory slice.
 */
export interface AppState<P extends PersistentState, T> {
  readonly persistent: P
  readonly transient: T
}

/**
 * Freezes `value` and every object reachable from it, in place. Subtrees that
 * are already frozen are taken as frozen throughout; typed arrays are left
 * writable.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null) return value
  if (Object.isFrozen(value) || ArrayBuffer.isView(value)) return value

  Object.freeze(value)
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key))
  }
  return value
}

/** Transient slice for applications that keep everything persistent. */
export type EmptyTransient = Readonly<Record<string, never>>

export const emptyTransient: EmptyTransient = Object.freeze({})

/**
 * Immutable snapshot handed to listeners, so that every listener of one
 * notification observes the same value.
 */
export class StateHolder<P extends PersistentState, T> {
  readonly state: AppState<P, T>

  constructor(state: AppState<P, T>) {
    this.state = state
  }
}

// =============================================================================
// LISTENERS
// =============================================================================

/**
 * Observer of state changes. The registry holds listeners without owning the
 * objects behind them; `zombie` reports that the backing receiver is gone.
 */
export interface StateListener<P extends PersistentState, T> {
  readonly zombie: boolean
  updateState(holder: StateHolder<P, T>): void
}
