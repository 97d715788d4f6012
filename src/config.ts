/**
 * Store configuration: the scalar settings accepted by `createStore`, their
 * defaults and their environment overrides, validated with zod.
 */

import { z } from 'zod'
import { ConfigError } from './errors'

export const DEFAULT_SAVE_DELAY_MS = 500
export const DEFAULT_IDLE_TIMEOUT_MS = 1000

const settingsSchema = z.object({
  persistenceKey: z.string().min(1, 'persistenceKey must not be empty').optional(),
  saveDelayMs: z.number().int().nonnegative().default(DEFAULT_SAVE_DELAY_MS),
  hasCodec: z.boolean(),
  hasBackend: z.boolean().default(false)
}).refine(
  settings => settings.persistenceKey === undefined || settings.hasCodec,
  { message: 'a codec is required when persistenceKey is set', path: ['codec'] }
).refine(
  settings => settings.persistenceKey === undefined || settings.hasBackend,
  { message: 'a backend is required when persistenceKey is set', path: ['backend'] }
)

export type StoreSettingsInput = z.input<typeof settingsSchema>

export interface StoreSettings {
  persistenceKey: string | undefined
  saveDelayMs: number
}

function envSaveDelay(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.LODESTORE_SAVE_DELAY_MS
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

/**
 * Validates the scalar store settings. An explicit `saveDelayMs` wins over
 * `LODESTORE_SAVE_DELAY_MS`, which wins over the default.
 *
 * @throws ConfigError listing every invalid setting.
 */
export function resolveStoreSettings(
  input: StoreSettingsInput,
  env: NodeJS.ProcessEnv = process.env
): StoreSettings {
  const result = settingsSchema.safeParse({
    ...input,
    saveDelayMs: input.saveDelayMs ?? envSaveDelay(env)
  })

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid store options: ${details}`, { cause: result.error })
  }

  return {
    persistenceKey: result.data.persistenceKey,
    saveDelayMs: result.data.saveDelayMs
  }
}
