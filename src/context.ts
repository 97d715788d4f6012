/**
 * Lodestore Ambient Store Context (with unctx)
 * ============================================
 *
 * Lets setup code and effects processors reach "the" store without passing
 * it around, the way a view hierarchy reaches an injected dispatch function.
 *
 * --- HOW IT WORKS ---
 * 1. `createStoreWithContext` creates a store and registers it as the
 *    singleton of a unctx namespace.
 * 2. `useStore()`, `useDispatch()` and friends read it back from anywhere in
 *    synchronous code. `runWithStore(store, fn)` binds a store for the
 *    duration of `fn` instead.
 *
 * --- ASYNC USAGE ---
 * As with all `unctx` contexts, the store is only available synchronously.
 * Read it into a local variable before the first `await`.
 *
 * `createStoreContext<P, T>()` gives the same hooks typed for one
 * application's state.
 */

import { getContext } from 'unctx'
import type { AppEvent, AppState, PersistentState } from './core'
import { createStore, type Store, type StoreOptions } from './store'

// --- TYPE DEFINITIONS ---

/** The part of a store that code outside the store needs. */
export interface StoreHandle<P extends PersistentState = PersistentState, T = unknown> {
  readonly id: string
  dispatch(event: AppEvent, bypassFilter?: boolean): void
  admit(event: AppEvent, bypassFilter?: boolean): Promise<boolean>
  getState(): AppState<P, T>
  whenIdle(): Promise<void>
}

export type Dispatch = (event: AppEvent, bypassFilter?: boolean) => void

export interface StoreContext<P extends PersistentState, T> {
  /** Creates a store and makes it this context's singleton. */
  create(options: StoreOptions<P, T>): Promise<Store<P, T>>
  /** Throws when no store is bound. */
  use(): StoreHandle<P, T>
  tryUse(): StoreHandle<P, T> | undefined
  useDispatch(): Dispatch
  run<R>(store: StoreHandle<P, T>, callback: () => R): R
  /** Removes the singleton. */
  unset(): void
}

export const DEFAULT_CONTEXT_KEY = 'lodestore-store-context'

// --- CONTEXT FACTORY ---

/**
 * Creates (or reopens) the context stored under `key`.
 *
 * @template P The persistent slice type.
 * @template T The transient slice type.
 */
export function createStoreContext<P extends PersistentState, T>(
  key: string = DEFAULT_CONTEXT_KEY
): StoreContext<P, T> {
  const context = getContext<StoreHandle<P, T>>(key)

  const use = (): StoreHandle<P, T> => context.use()

  return {
    async create(options) {
      const store = await createStore(options)
      // replace any store registered earlier
      context.set(store, true)
      return store
    },
    use,
    tryUse: () => context.tryUse() ?? undefined,
    useDispatch() {
      const store = use()
      return (event, bypassFilter) => store.dispatch(event, bypassFilter)
    },
    run: (store, callback) => context.call(store, callback),
    unset: () => context.unset()
  }
}

// --- DEFAULT CONTEXT ---

const defaultContext = createStoreContext<PersistentState, unknown>()

/**
 * Creates a store and registers it as the default ambient store.
 */
export function createStoreWithContext<P extends PersistentState, T>(
  options: StoreOptions<P, T>
): Promise<Store<P, T>> {
  return createStoreContext<P, T>().create(options)
}

/** The default ambient store. Throws when none is registered. */
export function useStore(): StoreHandle {
  return defaultContext.use()
}

/** The default ambient store, or `undefined`. */
export function tryUseStore(): StoreHandle | undefined {
  return defaultContext.tryUse()
}

/** Dispatch function of the default ambient store. */
export function useDispatch(): Dispatch {
  return defaultContext.useDispatch()
}

/** Runs `callback` with `store` bound as the default ambient store. */
export function runWithStore<R>(store: StoreHandle, callback: () => R): R {
  return defaultContext.run(store, callback)
}
