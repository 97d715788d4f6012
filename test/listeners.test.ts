import { describe, it, expect } from 'vitest'
import { StateHolder } from '../src/core'
import { ListenerError } from '../src/errors'
import { createListener, ListenerRegistry, WeakStateListener } from '../src/listeners'
import { defaultState, silentLogger, type Settings, type Transient } from './fixtures'

const holder = () => new StateHolder(defaultState())

describe('Listeners', () => {
  describe('ListenerRegistry', () => {
    it('should assign increasing ids and notify in registration order', () => {
      const registry = new ListenerRegistry<Settings, Transient>(silentLogger)
      const calls: string[] = []

      expect(registry.addListener(createListener<Settings, Transient>(() => calls.push('a')))).toBe(1)
      expect(registry.addListener(createListener<Settings, Transient>(() => calls.push('b')))).toBe(2)

      expect(registry.notifyListeners(holder())).toEqual({ notified: 2, pruned: 0 })
      expect(calls).toEqual(['a', 'b'])
    })

    it('should hand every listener the same holder', () => {
      const registry = new ListenerRegistry<Settings, Transient>(silentLogger)
      const seen: StateHolder<Settings, Transient>[] = []
      registry.addListener(createListener<Settings, Transient>(h => seen.push(h)))
      registry.addListener(createListener<Settings, Transient>(h => seen.push(h)))
      const snapshot = holder()

      registry.notifyListeners(snapshot)

      expect(seen).toEqual([snapshot, snapshot])
      expect(seen[0]).toBe(seen[1])
    })

    it('should prune zombies after the pass', () => {
      const registry = new ListenerRegistry<Settings, Transient>(silentLogger)
      const calls: string[] = []
      const gone = createListener<Settings, Transient>(() => calls.push('gone'))
      registry.addListener(gone)
      const keptId = registry.addListener(createListener<Settings, Transient>(() => calls.push('kept')))

      gone.dispose()

      expect(registry.notifyListeners(holder())).toEqual({ notified: 1, pruned: 1 })
      expect(registry.size).toBe(1)
      expect(registry.has(1)).toBe(false)
      expect(registry.has(keptId)).toBe(true)
      expect(calls).toEqual(['kept'])
    })

    it('should notify listeners added during a pass from the next pass on', () => {
      const registry = new ListenerRegistry<Settings, Transient>(silentLogger)
      const late: number[] = []
      let added = false
      registry.addListener(createListener<Settings, Transient>(() => {
        if (added) return
        added = true
        registry.addListener(createListener<Settings, Transient>(({ state }) => {
          late.push(state.persistent.counter)
        }))
      }))

      expect(registry.notifyListeners(holder())).toEqual({ notified: 1, pruned: 0 })
      expect(late).toEqual([])
      expect(registry.size).toBe(2)

      expect(registry.notifyListeners(holder())).toEqual({ notified: 2, pruned: 0 })
      expect(late).toEqual([0])
    })

    it('should report a failing listener and keep notifying the others', () => {
      const registry = new ListenerRegistry<Settings, Transient>(silentLogger)
      const errors: ListenerError[] = []
      let reached = false
      registry.addListener(createListener<Settings, Transient>(() => {
        throw new Error('render failed')
      }))
      registry.addListener(createListener<Settings, Transient>(() => {
        reached = true
      }))

      const result = registry.notifyListeners(holder(), error => errors.push(error))

      expect(result).toEqual({ notified: 1, pruned: 0 })
      expect(reached).toBe(true)
      expect(errors).toHaveLength(1)
      expect(errors[0]?.listenerId).toBe(1)
      expect(errors[0]?.cause).toEqual(new Error('render failed'))
    })
  })

  describe('WeakStateListener', () => {
    it('should forward to its target until released', () => {
      const target = { updates: 0 }
      const listener = new WeakStateListener<typeof target, Settings, Transient>(target, receiver => {
        receiver.updates++
      })

      listener.updateState(holder())
      expect(listener.zombie).toBe(false)
      expect(listener.target).toBe(target)

      listener.release()
      listener.updateState(holder())

      expect(listener.zombie).toBe(true)
      expect(listener.target).toBeUndefined()
      expect(target.updates).toBe(1)
    })
  })

  describe('createListener', () => {
    it('should stop calling back once disposed', () => {
      let calls = 0
      const listener = createListener<Settings, Transient>(() => {
        calls++
      })

      listener.updateState(holder())
      listener.dispose()
      listener.updateState(holder())

      expect(calls).toBe(1)
      expect(listener.zombie).toBe(true)
    })
  })
})
