import { describe, it, expect } from 'vitest'
import {
  deepFreeze,
  defineEvent,
  enqueue,
  isLifecycleEvent,
  isResetEvent,
  isStateRestoreEvent,
  RESET_EVENT_TYPE,
  resetEvent,
  STATE_RESTORE_EVENT_TYPE,
  stateRestoreEvent,
  StateHolder
} from '../src/core'
import { defaultState, increment, setCounter } from './fixtures'

describe('Core', () => {
  describe('defineEvent', () => {
    it('should create frozen events carrying their flags', () => {
      const event = setCounter(3)

      expect(event).toEqual({ type: 'counter/set', payload: 3, persist: true, isUIEvent: true })
      expect(Object.isFrozen(event)).toBe(true)
    })

    it('should default both flags to false', () => {
      const tick = defineEvent('clock/tick')

      expect(tick.persist).toBe(false)
      expect(tick.isUIEvent).toBe(false)
      expect(tick()).toEqual({ type: 'clock/tick', payload: undefined, persist: false, isUIEvent: false })
    })

    it('should match events by type', () => {
      const event = setCounter(7)

      expect(setCounter.match(event)).toBe(true)
      expect(increment.match(event)).toBe(false)
      if (setCounter.match(event)) {
        expect(event.payload).toBe(7)
      }
    })
  })

  describe('lifecycle events', () => {
    it('should persist the reset event as a UI event', () => {
      const event = resetEvent()

      expect(event.type).toBe(RESET_EVENT_TYPE)
      expect(event.persist).toBe(true)
      expect(event.isUIEvent).toBe(true)
      expect(isResetEvent(event)).toBe(true)
    })

    it('should build restore events that do not persist', () => {
      const persistent = defaultState().persistent
      const event = stateRestoreEvent(persistent)

      expect(event.type).toBe(STATE_RESTORE_EVENT_TYPE)
      expect(event.payload).toBe(persistent)
      expect(event.persist).toBe(false)
      expect(isStateRestoreEvent(event)).toBe(true)
    })

    it('should only classify reset and restore as lifecycle events', () => {
      expect(isLifecycleEvent(resetEvent())).toBe(true)
      expect(isLifecycleEvent(stateRestoreEvent({ version: 1 }))).toBe(true)
      expect(isLifecycleEvent(increment())).toBe(false)
    })
  })

  describe('enqueue', () => {
    it('should stamp the sequence and a monotonic time', () => {
      const before = performance.now()
      const first = enqueue(increment(), 1)
      const second = enqueue(increment(), 2)

      expect(first.sequence).toBe(1)
      expect(second.sequence).toBe(2)
      expect(first.enqueuedAt).toBeGreaterThanOrEqual(before)
      expect(second.enqueuedAt).toBeGreaterThanOrEqual(first.enqueuedAt)
      expect(Object.isFrozen(first)).toBe(true)
    })
  })

  describe('deepFreeze', () => {
    it('should freeze nested objects and arrays in place', () => {
      const value = { a: { b: [1, { c: 2 }] } }

      expect(deepFreeze(value)).toBe(value)
      expect(Object.isFrozen(value.a)).toBe(true)
      expect(Object.isFrozen(value.a.b)).toBe(true)
      expect(Object.isFrozen(value.a.b[1])).toBe(true)
    })

    it('should leave typed arrays and primitives alone', () => {
      const bytes = new Uint8Array([1, 2])
      deepFreeze({ bytes })

      expect(Object.isFrozen(bytes)).toBe(false)
      expect(deepFreeze(3)).toBe(3)
      expect(deepFreeze(null)).toBeNull()
    })
  })

  describe('StateHolder', () => {
    it('should hold the state it was created with', () => {
      const state = defaultState()
      expect(new StateHolder(state).state).toBe(state)
    })
  })
})
