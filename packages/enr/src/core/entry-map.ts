import { createNullLogger, type Logger } from "@enrkit/logger"
import { decodeItem, encodeItem, type RlpItem } from "@enrkit/rlp"
import { toUtf8Bytes } from "ethers"
import type { Entry, EntryType, InPlaceEntry } from "../ports/entry"
import { RawEntry } from "./entries/raw"
import { EntryError } from "./errors/entry-error"
import { errNotFound, KeyError } from "./errors/key-error"
import { decodeEntry, type RecordEntry } from "./known"

/** Largest encoded size of a whole node record, signature included. */
export const DEFAULT_MAX_SIZE = 300

export type EntryMapOptions = {
  /** Upper bound on `encodedSize()`. Default: 300 */
  maxSize?: number
  logger?: Logger
}

function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"))
}

/**
 * Key to encoded value, kept in canonical key order.
 *
 * Stands in for the record container: it stores what entries encode and
 * hands the bytes back to entry types on load. It neither signs nor
 * versions anything.
 */
export class EntryMap {
  private readonly pairs = new Map<string, Uint8Array>()
  private readonly maxSize: number
  private readonly logger: Logger

  constructor(options: EntryMapOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE
    this.logger = (options.logger ?? createNullLogger()).child({ module: "entry-map" })
  }

  get size(): number {
    return this.pairs.size
  }

  /**
   * Encodes `entry` and stores it under `entry.key`, replacing any previous
   * value. Nothing is stored when encoding fails or the map would outgrow
   * `maxSize`.
   */
  set(entry: Entry): void {
    const key = entry.key
    const value = entry.encode()

    const next = new Map(this.pairs).set(key, value)
    const size = encodedSizeOf(next)

    if (size > this.maxSize) {
      this.logger.warn("entry rejected", { key, kind: entry.kind, size })
      throw new EntryError(
        "entries_too_big",
        `entries too big: ${size} bytes, limit ${this.maxSize}`,
        { key, size, limit: this.maxSize },
      )
    }

    this.pairs.set(key, value)
    this.logger.debug("entry set", { key, kind: entry.kind, size: value.length })
  }

  /** Stores already-encoded bytes; they must hold one canonical RLP item. */
  setRaw(key: string, value: Uint8Array): void {
    this.set(new RawEntry(key, value))
  }

  has(key: string): boolean {
    return this.pairs.has(key)
  }

  delete(key: string): boolean {
    const deleted = this.pairs.delete(key)
    if (deleted) this.logger.debug("entry deleted", { key })
    return deleted
  }

  /** Keys in ascending byte order. */
  keys(): string[] {
    return [...this.pairs.keys()].sort(compareKeys)
  }

  raw(key: string): Uint8Array | undefined {
    const value = this.pairs.get(key)
    return value && Uint8Array.from(value)
  }

  /**
   * Decodes the value under `type.key`.
   *
   * @throws KeyError with `errNotFound` as cause when the key is absent, or
   * with the decoder's error as cause when the value is invalid
   */
  load<E extends Entry>(type: EntryType<E>): E {
    return this.decodeWith(type.key, (input) => type.decode(input))
  }

  /** Like `load`, for entries that decode into caller-owned storage. */
  loadInto(entry: InPlaceEntry): void {
    this.decodeWith(entry.key, (input) => entry.decode(input))
  }

  /** All pairs decoded to their entry types, in key order. */
  entries(): RecordEntry[] {
    return this.keys().map((key) => this.decodeWith(key, (input) => decodeEntry(key, input)))
  }

  /** Size of the pairs encoded as one RLP list of alternating key and value. */
  encodedSize(): number {
    return encodedSizeOf(this.pairs)
  }

  private decodeWith<R>(key: string, fn: (input: Uint8Array) => R): R {
    const value = this.pairs.get(key)
    if (value === undefined) throw new KeyError(key, errNotFound)

    try {
      return fn(value)
    } catch (err) {
      this.logger.warn("entry decode failed", { key, err })
      throw err instanceof KeyError && err.key === key ? err : new KeyError(key, err)
    }
  }
}

function encodedSizeOf(pairs: ReadonlyMap<string, Uint8Array>): number {
  const items: RlpItem[] = []

  for (const key of [...pairs.keys()].sort(compareKeys)) {
    const value = pairs.get(key)
    if (value !== undefined) items.push(toUtf8Bytes(key), decodeItem(value))
  }

  return encodeItem(items).length
}
