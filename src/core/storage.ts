/**
 * storage.ts
 *
 * Persistence collaborator contract plus the envelope format written
 * through it.
 *
 * Envelope: `{ data, timestamp, version }` where `data` is the output of
 * the query's toJson codec, `timestamp` is epoch ms of the write and
 * `version` is currently always 1. Envelopes are validated with zod on
 * read; anything that fails validation is treated as absent.
 */

import { z } from 'zod'
import { HydrationError } from './errors'

// ---------------------------------------------------------------------------
// Storage contract
// ---------------------------------------------------------------------------

export type StoredJson = Record<string, unknown>

/** Key/value store the engine persists to and hydrates from. */
export interface QueryStorage {
  write(key: string, json: StoredJson): Promise<void>
  read(key: string): Promise<StoredJson | null>
  delete(key: string): Promise<void>
}

/**
 * In-process storage. Values are deep-copied through JSON on write so that
 * later mutation of the source object cannot leak into the store.
 */
export class MemoryStorage implements QueryStorage {
  #entries = new Map<string, string>()

  async write(key: string, json: StoredJson): Promise<void> {
    this.#entries.set(key, JSON.stringify(json))
  }

  async read(key: string): Promise<StoredJson | null> {
    const raw = this.#entries.get(key)
    if (raw === undefined) return null
    const parsed: unknown = JSON.parse(raw)
    return storedJsonSchema.parse(parsed)
  }

  async delete(key: string): Promise<void> {
    this.#entries.delete(key)
  }

  has(key: string): boolean {
    return this.#entries.has(key)
  }

  keys(): string[] {
    return [...this.#entries.keys()]
  }

  clear(): void {
    this.#entries.clear()
  }
}

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export const ENVELOPE_VERSION = 1

const storedJsonSchema = z.record(z.unknown())

export const persistedEnvelopeSchema = z.object({
  data: z.unknown(),
  timestamp: z.number().int().nonnegative(),
  version: z.literal(ENVELOPE_VERSION),
})

export type PersistedEnvelope = z.infer<typeof persistedEnvelopeSchema>

export function createEnvelope(data: unknown, timestamp: number): StoredJson {
  return { data, timestamp, version: ENVELOPE_VERSION }
}

/**
 * Validate a raw stored value.
 *
 * @throws HydrationError when the value is not a version-1 envelope.
 */
export function parseEnvelope(key: string, raw: unknown): PersistedEnvelope {
  const result = persistedEnvelopeSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue?.path.join('.') || 'envelope'
    throw new HydrationError(key, `${path}: ${issue?.message ?? 'invalid envelope'}`)
  }
  return result.data
}

/** An envelope older than `cacheTime` is expired and must be discarded. */
export function isEnvelopeExpired(
  envelope: PersistedEnvelope,
  cacheTime: number,
  now: number = Date.now(),
): boolean {
  return now - envelope.timestamp > cacheTime
}
