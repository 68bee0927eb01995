/**
 * A decoded RLP value: a byte string or an ordered list of items.
 * These are the only two forms the encoding knows about.
 */
export type RlpItem = Uint8Array | readonly RlpItem[]
