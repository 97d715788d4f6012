/**
 * Declarative state forwarders.
 *
 * A forwarder projects selected fields of the state tree onto a receiver
 * object (a view model, a component's state bag) and only writes the fields
 * whose value changed. The receiver is held weakly: once it is collected,
 * or the forwarder is released, the store drops the registration.
 */

import type { AppState, PersistentState, StateHolder } from './core'
import { deepEqual, type EqualityFn } from './equality'
import { WeakStateListener } from './listeners'

// =============================================================================
// PATH TYPES
// =============================================================================

/**
 * Dot-separated paths through an object type. Arrays are leaves.
 */
export type StatePath<T> = T extends readonly unknown[]
  ? never
  : T extends object
    ? {
        [K in keyof T & string]: K | (T[K] extends readonly unknown[]
          ? never
          : T[K] extends object
            ? `${K}.${StatePath<T[K]>}`
            : never)
      }[keyof T & string]
    : never

/** One `[sourcePath, targetField]` pair. */
export type ForwardEntry<S, TTarget> = readonly [StatePath<S>, keyof TTarget & string]

export type ForwardMapping<S, TTarget> = ReadonlyArray<ForwardEntry<S, TTarget>>

export interface ForwarderOptions<TTarget> {
  /** Called after a notification changed at least one field. */
  onChange?: (target: TTarget, changed: readonly string[]) => void
  /** Defaults to deep equality. */
  isEqual?: EqualityFn
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Reads a value at a dot-separated path, or `undefined` when the path leaves
 * the structure.
 */
export function getAtPath(root: unknown, path: string): unknown {
  return path.split('.').reduce<unknown>((current, key) => (isRecord(current) ? current[key] : undefined), root)
}

/**
 * Writes the mapped fields of `state` that differ from the target's
 * current values.
 *
 * @returns The target fields that were written.
 */
export function forwardState<S, TTarget extends object>(
  state: S,
  target: TTarget,
  mapping: ForwardMapping<S, TTarget>,
  isEqual: EqualityFn = deepEqual
): string[] {
  const changed: string[] = []
  for (const [sourcePath, field] of mapping) {
    const next = getAtPath(state, String(sourcePath))
    if (isEqual(Reflect.get(target, field), next)) continue
    Reflect.set(target, field, next)
    changed.push(field)
  }
  return changed
}

/**
 * Creates a weakly-held listener forwarding mapped state fields to `target`.
 *
 * @example
 * ```ts
 * const viewModel: { counter: number; entries: readonly EventLogEntry[] } = { counter: 0, entries: [] }
 * store.addListener(createForwarder<Settings, Transient, typeof viewModel>(viewModel, [
 *   ['persistent.counter', 'counter'],
 *   ['transient.eventLog.entries', 'entries']
 * ]))
 * ```
 */
export function createForwarder<P extends PersistentState, T, TTarget extends object>(
  target: TTarget,
  mapping: ForwardMapping<AppState<P, T>, TTarget>,
  options: ForwarderOptions<TTarget> = {}
): WeakStateListener<TTarget, P, T> {
  const isEqual = options.isEqual ?? deepEqual

  return new WeakStateListener<TTarget, P, T>(target, (receiver, holder: StateHolder<P, T>) => {
    const changed = forwardState(holder.state, receiver, mapping, isEqual)
    if (changed.length > 0) options.onChange?.(receiver, changed)
  })
}
