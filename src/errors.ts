/**
 * Error types raised or reported by a store and its coordinators.
 *
 * None of these escape `dispatch`: the store logs them and hands them to the
 * `onError` hook. They are thrown to callers only from `createStore`
 * (configuration) and from direct coordinator calls made outside a store.
 */

export type LodestoreErrorCode =
  | 'CONFIG'
  | 'DECODE'
  | 'PERSISTENCE'
  | 'REDUCER'
  | 'EFFECT'
  | 'LISTENER'
  | 'FILTER'
  | 'STORE_CLOSED'

export class LodestoreError extends Error {
  readonly code: LodestoreErrorCode

  constructor(code: LodestoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class ConfigError extends LodestoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options)
  }
}

/** Persisted bytes could not be turned back into a persistent slice. */
export class DecodeError extends LodestoreError {
  readonly key: string

  constructor(key: string, options?: { cause?: unknown }) {
    super('DECODE', `Could not decode persisted state for key "${key}"`, options)
    this.key = key
  }
}

/** Encoding or writing a persistent slice failed. */
export class PersistenceError extends LodestoreError {
  readonly key: string

  constructor(key: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', `Could not write persisted state for key "${key}"`, options)
    this.key = key
  }
}

export class ReducerError extends LodestoreError {
  readonly eventType: string

  constructor(eventType: string, options?: { cause?: unknown }) {
    super('REDUCER', `Reducer failed on "${eventType}"; the event was skipped`, options)
    this.eventType = eventType
  }
}

export class EffectError extends LodestoreError {
  readonly eventType: string

  constructor(eventType: string, options?: { cause?: unknown }) {
    super('EFFECT', `Effects failed on "${eventType}"`, options)
    this.eventType = eventType
  }
}

export class ListenerError extends LodestoreError {
  readonly listenerId: number

  constructor(listenerId: number, options?: { cause?: unknown }) {
    super('LISTENER', `Listener ${listenerId} failed while receiving state`, options)
    this.listenerId = listenerId
  }
}

export class FilterError extends LodestoreError {
  readonly eventType: string

  constructor(eventType: string, options?: { cause?: unknown }) {
    super('FILTER', `Dispatch filter failed on "${eventType}"; the event was dropped`, options)
    this.eventType = eventType
  }
}

export class StoreClosedError extends LodestoreError {
  constructor(storeId: string) {
    super('STORE_CLOSED', `Store ${storeId} is closed`)
  }
}
