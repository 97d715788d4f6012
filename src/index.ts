/**
 * Lodestore: Unidirectional State Store
 * =====================================
 *
 * A single-writer application state container. Features:
 *
 * - Ordered event queue drained by one consumer loop
 * - Pure reducer pipeline with built-in reset and restore events
 * - Debounced, versioned persistence of the persistent slice
 * - One awaited effects handler per store
 * - Weakly held listeners and declarative state forwarders
 * - Event recording with timed replay, and an in-state event log
 * - Ambient store access through unctx
 *
 * @example
 * ```ts
 * import { createStore, createSchemaCodec, defineEvent, createReducer, emptyTransient } from 'lodestore'
 *
 * const increment = defineEvent('counter/increment', { persist: true, isUIEvent: true })
 * const store = await createStore({
 *   defaultState: () => ({ persistent: { version: 1, counter: 0 }, transient: emptyTransient }),
 *   reducers: [createReducer(on => on.on(increment, s => ({ ...s, persistent: { ...s.persistent, counter: s.persistent.counter + 1 } })))]
 * })
 * store.dispatch(increment())
 * ```
 *
 * @version 1.0.0
 * @license MIT
 */

export * from './core'
export * from './equality'
export * from './errors'
export * from './logger'
export * from './config'
export * from './queue'
export * from './reducers'
export * from './codec'
export * from './backends'
export * from './persistence'
export * from './effects'
export * from './listeners'
export * from './forwarder'
export * from './lifecycle'
export * from './store'
export * from './recorder'
export * from './event-log'
export * from './context'
