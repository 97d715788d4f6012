import { z } from 'zod'
import {
  createLogger,
  createReducer,
  createSchemaCodec,
  createStore,
  defineEvent,
  emptyEventLog,
  EventLogReducer,
  lens,
  schemaVersion,
  scopeReducer,
  type AppState,
  type EventLogState,
  type StoreOptions
} from '../src/index'

export const SettingsSchema = z.object({
  version: schemaVersion(1),
  counter: z.number().default(0),
  name: z.string().default('')
})

export type Settings = z.infer<typeof SettingsSchema>

export interface Transient {
  note: string
  eventLog: EventLogState
}

export type TestState = AppState<Settings, Transient>

export const settingsCodec = createSchemaCodec(SettingsSchema)

export const silentLogger = createLogger({ level: 'silent' })

export const defaultState = (): TestState => ({
  persistent: { version: 1, counter: 0, name: '' },
  transient: { note: '', eventLog: emptyEventLog }
})

export const increment = defineEvent('counter/increment', { persist: true, isUIEvent: true })
export const setCounter = defineEvent<'counter/set', number>('counter/set', { persist: true, isUIEvent: true })
export const setNote = defineEvent<'note/set', string>('note/set', { isUIEvent: true })
export const boom = defineEvent('test/boom')

function withCounter(state: TestState, counter: number): TestState {
  return { ...state, persistent: { ...state.persistent, counter } }
}

export const counterReducer = createReducer<TestState>(on => on
  .on(increment, state => withCounter(state, state.persistent.counter + 1))
  .on(setCounter, (state, event) => withCounter(state, event.payload))
  .on(setNote, (state, event) => ({ ...state, transient: { ...state.transient, note: event.payload } }))
)

export const eventLogLens = lens(
  (state: TestState) => state.transient.eventLog,
  (state, eventLog: EventLogState) => ({ ...state, transient: { ...state.transient, eventLog } })
)

export function makeStore(options: Partial<StoreOptions<Settings, Transient>> = {}) {
  return createStore<Settings, Transient>({
    defaultState,
    reducers: [counterReducer, scopeReducer(eventLogLens, new EventLogReducer())],
    logger: silentLogger,
    ...options
  })
}
