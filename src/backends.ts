/**
 * Key-value backends holding one opaque blob per persistence key.
 *
 * Backends are synchronous and single-writer per key; two stores sharing a
 * key on one backend is unsupported.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

export interface KeyValueBackend {
  read(key: string): Uint8Array | undefined
  write(key: string, bytes: Uint8Array): void
  remove(key: string): void
}

/**
 * In-memory backend. Stored bytes are copied in and out, so callers never
 * share a buffer with the backend.
 */
export class MemoryBackend implements KeyValueBackend {
  private readonly entries = new Map<string, Uint8Array>()

  read(key: string): Uint8Array | undefined {
    const bytes = this.entries.get(key)
    return bytes ? bytes.slice() : undefined
  }

  write(key: string, bytes: Uint8Array): void {
    this.entries.set(key, bytes.slice())
  }

  remove(key: string): void {
    this.entries.delete(key)
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * One file per key under a directory. Writes go to a temporary file that is
 * renamed over the target, so a crash never leaves a half-written blob.
 */
export class FileBackend implements KeyValueBackend {
  readonly directory: string

  constructor(directory: string) {
    this.directory = directory
    mkdirSync(directory, { recursive: true })
  }

  pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.bin`)
  }

  read(key: string): Uint8Array | undefined {
    try {
      return new Uint8Array(readFileSync(this.pathFor(key)))
    } catch (error) {
      if (isMissingFile(error)) return undefined
      throw error
    }
  }

  write(key: string, bytes: Uint8Array): void {
    const target = this.pathFor(key)
    const temporary = `${target}.${process.pid}.tmp`
    writeFileSync(temporary, bytes)
    renameSync(temporary, target)
  }

  remove(key: string): void {
    rmSync(this.pathFor(key), { force: true })
  }
}
