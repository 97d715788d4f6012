/**
 * Lodestore Reducers
 * ==================
 *
 * Pure state transitions and the pipeline that folds them over the current
 * state, one queued event at a time.
 *
 * - `ReducerPipeline` applies registered reducers in registration order and
 *   handles the reset and restore lifecycle events itself.
 * - `createReducer` builds a reducer from typed `.on(creator, handler)` cases.
 * - `lens` / `scopeReducer` embed a reducer written for one slice of the
 *   state into the whole state tree.
 */

import {
  isResetEvent,
  isStateRestoreEvent,
  type AppEvent,
  type AppState,
  type DefinedEvent,
  type EnqueuedEvent,
  type EventCreator,
  type PersistentState
} from './core'

// =============================================================================
// REDUCER TYPES
// =============================================================================

/**
 * A pure function from the current state and one queued event to the next
 * state. Later reducers see the output of earlier ones.
 */
export type Reducer<S> = (state: S, enqueued: EnqueuedEvent) => S

/** Object form of a reducer, for reducers that carry configuration. */
export interface EventReducer<S> {
  reduce(state: S, enqueued: EnqueuedEvent): S
}

export type ReducerLike<S> = Reducer<S> | EventReducer<S>

export function toReducer<S>(reducer: ReducerLike<S>): Reducer<S> {
  if (typeof reducer === 'function') return reducer
  return (state, enqueued) => reducer.reduce(state, enqueued)
}

// =============================================================================
// REDUCER BUILDER
// =============================================================================

/**
 * Handler for one event type inside {@link createReducer}.
 */
export type CaseHandler<S, E extends AppEvent> = (state: S, event: E, enqueued: EnqueuedEvent) => S

export interface ReducerBuilder<S> {
  /** Adds a case. Cases matching the same event apply in declaration order. */
  on<TType extends string, TPayload>(
    creator: EventCreator<TType, TPayload>,
    handler: CaseHandler<S, DefinedEvent<TType, TPayload>>
  ): ReducerBuilder<S>
  /** Adds a case for every event accepted by a type guard. */
  when<E extends AppEvent>(guard: (event: AppEvent) => event is E, handler: CaseHandler<S, E>): ReducerBuilder<S>
}

/**
 * Creates a reducer from typed event cases. Events matched by no case leave
 * the state untouched.
 *
 * @example
 * ```ts
 * const increment = defineEvent('counter/increment', { persist: true, isUIEvent: true })
 * const setCounter = defineEvent<'counter/set', number>('counter/set', { persist: true, isUIEvent: true })
 *
 * const counterReducer = createReducer<AppState<Settings, EmptyTransient>>(on => on
 *   .on(increment, state => ({ ...state, persistent: { ...state.persistent, counter: state.persistent.counter + 1 } }))
 *   .on(setCounter, (state, event) => ({ ...state, persistent: { ...state.persistent, counter: event.payload } }))
 * )
 * ```
 */
export function createReducer<S>(build: (builder: ReducerBuilder<S>) => ReducerBuilder<S>): Reducer<S> {
  const cases: Reducer<S>[] = []

  const builder: ReducerBuilder<S> = {
    on(creator, handler) {
      cases.push((state, enqueued) => {
        const { event } = enqueued
        return creator.match(event) ? handler(state, event, enqueued) : state
      })
      return builder
    },
    when(guard, handler) {
      cases.push((state, enqueued) => {
        const { event } = enqueued
        return guard(event) ? handler(state, event, enqueued) : state
      })
      return builder
    }
  }

  build(builder)

  return (state, enqueued) => cases.reduce((current, apply) => apply(current, enqueued), state)
}

// =============================================================================
// LENSES
// =============================================================================

/**
 * Immutable focus on one part of a larger structure.
 * @template TRoot The root structure type.
 * @template TFocus The focused value type.
 */
export interface Lens<TRoot, TFocus> {
  get(root: TRoot): TFocus
  set(root: TRoot, value: TFocus): TRoot
  update(root: TRoot, updater: (focus: TFocus) => TFocus): TRoot
  /** Focuses deeper through another lens. */
  compose<TNext>(next: Lens<TFocus, TNext>): Lens<TRoot, TNext>
  /** Focuses on a property of the current focus. */
  at<TKey extends keyof TFocus>(key: TKey): Lens<TRoot, TFocus[TKey]>
}

/**
 * Creates a lens from a getter and a setter.
 *
 * @example
 * ```ts
 * const eventLogLens = lens(
 *   (state: AppState<Settings, Transient>) => state.transient.eventLog,
 *   (state, eventLog) => ({ ...state, transient: { ...state.transient, eventLog } })
 * )
 * ```
 */
export function lens<TRoot, TFocus>(
  getter: (root: TRoot) => TFocus,
  setter: (root: TRoot, value: TFocus) => TRoot
): Lens<TRoot, TFocus> {
  return {
    get: getter,
    set: setter,
    update: (root, updater) => setter(root, updater(getter(root))),
    compose: <TNext>(next: Lens<TFocus, TNext>) =>
      lens<TRoot, TNext>(
        root => next.get(getter(root)),
        (root, value) => setter(root, next.set(getter(root), value))
      ),
    at: <TKey extends keyof TFocus>(key: TKey) =>
      lens<TRoot, TFocus[TKey]>(
        root => getter(root)[key],
        (root, value) => setter(root, { ...getter(root), [key]: value })
      )
  }
}

/**
 * Lifts a reducer over a slice into a reducer over the whole state. The root
 * is only rebuilt when the slice reducer returns a different object.
 */
export function scopeReducer<TRoot, TSlice>(focus: Lens<TRoot, TSlice>, reducer: ReducerLike<TSlice>): Reducer<TRoot> {
  const reduceSlice = toReducer(reducer)
  return (state, enqueued) => {
    const slice = focus.get(state)
    const next = reduceSlice(slice, enqueued)
    return next === slice ? state : focus.set(state, next)
  }
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Ordered reducer list applied to one event at a time.
 *
 * Reset recomputes the state from the default-state factory and restore
 * replaces only the persistent slice; neither reaches registered reducers.
 */
export class ReducerPipeline<P extends PersistentState, T> {
  private readonly reducers: Reducer<AppState<P, T>>[] = []
  private readonly defaultState: () => AppState<P, T>

  constructor(defaultState: () => AppState<P, T>) {
    this.defaultState = defaultState
  }

  get length(): number {
    return this.reducers.length
  }

  addReducer(reducer: ReducerLike<AppState<P, T>>): void {
    this.reducers.push(toReducer(reducer))
  }

  process(state: AppState<P, T>, enqueued: EnqueuedEvent): AppState<P, T> {
    const { event } = enqueued

    if (isResetEvent(event)) {
      return this.defaultState()
    }

    if (isStateRestoreEvent<P>(event)) {
      return { ...state, persistent: event.payload }
    }

    let next = state
    for (const reducer of this.reducers) {
      next = reducer(next, enqueued)
    }
    return next
  }
}
