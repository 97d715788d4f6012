/**
 * Codecs turning a persistent slice into bytes and back.
 *
 * The schema codec writes MessagePack and reads it back through a zod schema:
 * fields the schema does not know are dropped, fields the bytes lack take the
 * schema's defaults. That is what lets a newer schema read older bytes and an
 * older schema read newer ones.
 */

import { decode, encode } from '@msgpack/msgpack'
import { z } from 'zod'

export interface PersistenceCodec<P> {
  encode(value: P): Uint8Array
  /** Throws when the bytes do not describe a valid value. */
  decode(bytes: Uint8Array): P
}

/**
 * Creates a MessagePack codec validated by a zod schema.
 *
 * @example
 * ```ts
 * const SettingsV2 = z.object({
 *   version: schemaVersion(2),
 *   counter: z.number().default(0),
 *   name: z.string().default(''),
 *   config: ConfigSchema.default({})
 * })
 * const codec = createSchemaCodec(SettingsV2)
 * ```
 */
export function createSchemaCodec<P>(schema: z.ZodType<P, z.ZodTypeDef, unknown>): PersistenceCodec<P> {
  return {
    encode: value => encode(value, { ignoreUndefined: true }),
    decode: bytes => schema.parse(decode(bytes))
  }
}

/**
 * Schema field for a slice's `version`: accepts any stored value (or none)
 * and always yields the current version, so decoded values carry the
 * version of the schema that read them.
 */
export function schemaVersion<V extends number>(current: V): z.ZodType<V, z.ZodTypeDef, unknown> {
  return z.unknown().transform((): V => current)
}
