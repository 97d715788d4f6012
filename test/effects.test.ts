import { describe, it, expect, vi } from 'vitest'
import type { AppEvent } from '../src/core'
import { combineEffects, EffectsCoordinator, type EffectsHandler } from '../src/effects'
import { defaultState, increment, type Settings, type Transient } from './fixtures'

describe('Effects', () => {
  describe('EffectsCoordinator', () => {
    it('should do nothing without a handler', async () => {
      const coordinator = new EffectsCoordinator<Settings, Transient>()

      expect(coordinator.hasEffects).toBe(false)
      await expect(coordinator.executeEffects(increment(), defaultState())).resolves.toBeUndefined()
    })

    it('should pass the event and state to the installed handler', async () => {
      const coordinator = new EffectsCoordinator<Settings, Transient>()
      const handler = vi.fn()
      coordinator.setEffects(handler)
      const event = increment()
      const state = defaultState()

      await coordinator.executeEffects(event, state)

      expect(coordinator.hasEffects).toBe(true)
      expect(handler).toHaveBeenCalledWith(event, state)
    })

    it('should keep only the last installed handler', async () => {
      const coordinator = new EffectsCoordinator<Settings, Transient>()
      const first = vi.fn()
      const second = vi.fn()
      coordinator.setEffects(first)
      coordinator.setEffects(second)

      await coordinator.executeEffects(increment(), defaultState())
      coordinator.setEffects(undefined)
      await coordinator.executeEffects(increment(), defaultState())

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledTimes(1)
      expect(coordinator.hasEffects).toBe(false)
    })

    it('should wait for asynchronous handlers', async () => {
      const coordinator = new EffectsCoordinator<Settings, Transient>()
      let finished = false
      coordinator.setEffects(async () => {
        await new Promise(resolve => setTimeout(resolve, 5))
        finished = true
      })

      await coordinator.executeEffects(increment(), defaultState())

      expect(finished).toBe(true)
    })
  })

  describe('combineEffects', () => {
    it('should run handlers in order', async () => {
      const calls: string[] = []
      const record = (name: string): EffectsHandler<Settings, Transient> => async (event: AppEvent) => {
        await Promise.resolve()
        calls.push(`${name}:${event.type}`)
      }

      await combineEffects(record('a'), record('b'))(increment(), defaultState())

      expect(calls).toEqual(['a:counter/increment', 'b:counter/increment'])
    })

    it('should stop at the first failing handler', async () => {
      const after = vi.fn()
      const combined = combineEffects<Settings, Transient>(() => {
        throw new Error('offline')
      }, after)

      await expect(combined(increment(), defaultState())).rejects.toThrow('offline')
      expect(after).not.toHaveBeenCalled()
    })
  })
})
