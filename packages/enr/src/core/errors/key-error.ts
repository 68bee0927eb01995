import { BaseError, findInChain } from "@enrkit/errors"

/** Cause of a KeyError when the record has no value under the key. */
export const errNotFound: Error = Object.freeze(new Error("not found"))

export type KeyErrorCode = "key_not_found" | "key_invalid"

/**
 * An error scoped to one record key.
 *
 * The cause is either `errNotFound` or whatever the entry's decoder threw.
 */
export class KeyError extends BaseError<KeyErrorCode> {
  readonly key: string

  constructor(key: string, cause: unknown) {
    const missing = cause === errNotFound

    super(missing ? `missing ENR key ${quote(key)}` : `ENR key ${quote(key)}: ${describe(cause)}`, {
      code: missing ? "key_not_found" : "key_invalid",
      context: { key },
      cause,
    })
    this.key = key
  }
}

function quote(key: string): string {
  return JSON.stringify(key)
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Reports whether `err` means a key/value pair is missing from a record:
 * the first KeyError in its cause chain has `errNotFound` as its cause.
 */
export function isNotFound(err: unknown): boolean {
  const keyErr = findInChain(err, (v): v is KeyError => v instanceof KeyError)
  return keyErr?.cause === errNotFound
}
