/**
 * Lodestore Listener Registry
 * ===========================
 *
 * Registrations of state observers whose lifetimes belong to the application.
 *
 * The registry only looks listeners up; it never keeps their receivers alive.
 * A listener reports `zombie` once its receiver is gone, and the next
 * notification pass drops it.
 */

import type { PersistentState, StateHolder, StateListener } from './core'
import { ListenerError } from './errors'
import type { Logger } from './logger'
import { createLogger } from './logger'

// =============================================================================
// REGISTRY
// =============================================================================

interface Registration<P extends PersistentState, T> {
  readonly id: number
  readonly listener: StateListener<P, T>
}

export interface NotifyResult {
  notified: number
  pruned: number
}

export class ListenerRegistry<P extends PersistentState, T> {
  private registrations: Registration<P, T>[] = []
  private nextId = 1
  private readonly logger: Logger

  constructor(logger: Logger = createLogger()) {
    this.logger = logger.child({ component: 'listeners' })
  }

  get size(): number {
    return this.registrations.length
  }

  has(id: number): boolean {
    return this.registrations.some(registration => registration.id === id)
  }

  /** Registers a listener and returns its id. Registration order is notification order. */
  addListener(listener: StateListener<P, T>): number {
    const id = this.nextId++
    this.registrations.push({ id, listener })
    return id
  }

  /**
   * Delivers `holder` to every live listener in registration order, then
   * drops zombie registrations in one batch. A throwing listener is reported
   * and does not stop the others. Listeners added during the pass are first
   * notified by the next one.
   */
  notifyListeners(holder: StateHolder<P, T>, onError?: (error: ListenerError) => void): NotifyResult {
    const zombies = new Set<number>()
    let notified = 0

    for (const { id, listener } of [...this.registrations]) {
      if (listener.zombie) {
        zombies.add(id)
        continue
      }

      try {
        listener.updateState(holder)
        notified++
      } catch (cause) {
        const error = new ListenerError(id, { cause })
        this.logger.error({ err: error }, 'listener failed')
        onError?.(error)
      }
    }

    if (zombies.size > 0) {
      this.registrations = this.registrations.filter(registration => !zombies.has(registration.id))
      this.logger.debug({ pruned: zombies.size, remaining: this.registrations.length }, 'zombie listeners pruned')
    }

    return { notified, pruned: zombies.size }
  }
}

// =============================================================================
// LISTENER IMPLEMENTATIONS
// =============================================================================

/**
 * Listener bound weakly to a receiver object. It turns into a zombie when the
 * receiver is garbage collected or when `release()` is called.
 *
 * @template TTarget The receiver type.
 */
export class WeakStateListener<TTarget extends object, P extends PersistentState, T> implements StateListener<P, T> {
  private readonly ref: WeakRef<TTarget>
  private readonly forward: (target: TTarget, holder: StateHolder<P, T>) => void
  private released = false

  constructor(target: TTarget, forward: (target: TTarget, holder: StateHolder<P, T>) => void) {
    this.ref = new WeakRef(target)
    this.forward = forward
  }

  get zombie(): boolean {
    return this.released || this.ref.deref() === undefined
  }

  /** The receiver, or `undefined` once released or collected. */
  get target(): TTarget | undefined {
    return this.released ? undefined : this.ref.deref()
  }

  release(): void {
    this.released = true
  }

  updateState(holder: StateHolder<P, T>): void {
    const target = this.target
    if (target) this.forward(target, holder)
  }
}

/**
 * Listener owning a plain callback. `dispose()` turns it into a zombie.
 */
export interface CallbackListener<P extends PersistentState, T> extends StateListener<P, T> {
  dispose(): void
}

export function createListener<P extends PersistentState, T>(
  callback: (holder: StateHolder<P, T>) => void
): CallbackListener<P, T> {
  let disposed = false
  return {
    get zombie() {
      return disposed
    },
    updateState: holder => {
      if (!disposed) callback(holder)
    },
    dispose: () => {
      disposed = true
    }
  }
}
