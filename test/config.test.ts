import { describe, it, expect } from 'vitest'
import { DEFAULT_SAVE_DELAY_MS, resolveStoreSettings } from '../src/config'
import { ConfigError, LodestoreError, ReducerError, StoreClosedError } from '../src/errors'
import { createLogger, defaultLogLevel } from '../src/logger'

describe('Configuration', () => {
  describe('resolveStoreSettings', () => {
    it('should apply defaults', () => {
      expect(resolveStoreSettings({ hasCodec: false }, {})).toEqual({
        persistenceKey: undefined,
        saveDelayMs: DEFAULT_SAVE_DELAY_MS
      })
    })

    it('should read the save delay from the environment', () => {
      const env = { LODESTORE_SAVE_DELAY_MS: '25' }

      expect(resolveStoreSettings({ hasCodec: false }, env).saveDelayMs).toBe(25)
      expect(resolveStoreSettings({ hasCodec: false, saveDelayMs: 40 }, env).saveDelayMs).toBe(40)
      expect(resolveStoreSettings({ hasCodec: false }, { LODESTORE_SAVE_DELAY_MS: ' ' }).saveDelayMs).toBe(500)
    })

    it('should require a codec for a persistence key', () => {
      expect(() => resolveStoreSettings({ persistenceKey: 'settings', hasCodec: false, hasBackend: true }, {})).toThrow(
        'Invalid store options: codec: a codec is required when persistenceKey is set'
      )
    })

    it('should require a backend for a persistence key', () => {
      expect(() => resolveStoreSettings({ persistenceKey: 'settings', hasCodec: true }, {})).toThrow(
        'Invalid store options: backend: a backend is required when persistenceKey is set'
      )
    })

    it('should reject an empty key', () => {
      expect(() => resolveStoreSettings({ persistenceKey: '', hasCodec: true, hasBackend: true }, {})).toThrow(
        'Invalid store options: persistenceKey: persistenceKey must not be empty'
      )
    })

    it('should reject invalid delays', () => {
      expect(() => resolveStoreSettings({ hasCodec: false, saveDelayMs: -1 }, {})).toThrow(ConfigError)
      expect(() => resolveStoreSettings({ hasCodec: false }, { LODESTORE_SAVE_DELAY_MS: 'soon' })).toThrow(ConfigError)
    })
  })

  describe('logger', () => {
    it('should pick the level from the environment', () => {
      expect(defaultLogLevel({})).toBe('info')
      expect(defaultLogLevel({ NODE_ENV: 'test' })).toBe('silent')
      expect(defaultLogLevel({ NODE_ENV: 'test', LODESTORE_LOG_LEVEL: 'debug' })).toBe('debug')
      expect(defaultLogLevel({ LODESTORE_LOG_LEVEL: 'loud' })).toBe('info')
    })

    it('should create a logger at the requested level', () => {
      expect(createLogger({ level: 'warn' }).level).toBe('warn')
    })
  })

  describe('errors', () => {
    it('should carry a code, a name and the cause', () => {
      const cause = new Error('bad input')
      const error = new ReducerError('counter/set', { cause })

      expect(error).toBeInstanceOf(LodestoreError)
      expect(error.code).toBe('REDUCER')
      expect(error.name).toBe('ReducerError')
      expect(error.eventType).toBe('counter/set')
      expect(error.cause).toBe(cause)
      expect(new StoreClosedError('s-1').message).toBe('Store s-1 is closed')
    })
  })
})
