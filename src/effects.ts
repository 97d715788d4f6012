/**
 * Holder for the single effects handler of a store.
 *
 * The store awaits the handler before notifying listeners; work the handler
 * wants to outlive the event must be started without being awaited.
 */

import type { AppEvent, AppState, PersistentState } from './core'

export type EffectsHandler<P extends PersistentState, T> = (
  event: AppEvent,
  state: AppState<P, T>
) => void | Promise<void>

export class EffectsCoordinator<P extends PersistentState, T> {
  private effects: EffectsHandler<P, T> | undefined

  get hasEffects(): boolean {
    return this.effects !== undefined
  }

  /** Installs the handler, replacing any previous one. `undefined` removes it. */
  setEffects(effects: EffectsHandler<P, T> | undefined): void {
    this.effects = effects
  }

  async executeEffects(event: AppEvent, state: AppState<P, T>): Promise<void> {
    if (!this.effects) return
    await this.effects(event, state)
  }
}

/**
 * Combines several handlers into one, run in order. A failing handler stops
 * the ones after it and rejects the combined call.
 */
export function combineEffects<P extends PersistentState, T>(
  ...handlers: EffectsHandler<P, T>[]
): EffectsHandler<P, T> {
  return async (event, state) => {
    for (const handler of handlers) {
      await handler(event, state)
    }
  }
}
