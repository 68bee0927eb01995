import { decode, encode, string } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"

/** The default identity scheme. */
export const IDv4 = "v4"

/** The "id" key, the name of the identity scheme that signed the record. */
export class ID implements Entry {
  static readonly key = "id"
  static readonly v4 = new ID(IDv4)

  readonly kind = "id"
  readonly key = "id"

  constructor(readonly value: string) {}

  encode(): Uint8Array {
    return encode(string, this.value)
  }

  static decode(input: Uint8Array): ID {
    return new ID(decode(string, input))
  }
}
