import { decode, encode, list, string } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"
import { EntryError } from "../errors/entry-error"

/**
 * Name, version and optional extra build information, in that order.
 * A slot is present when it holds a string; the empty string counts.
 */
export type ClientSlots = readonly [string | undefined, string | undefined, string | undefined]

const strings = list(string)

function checkLength(length: number): void {
  if (length < 2 || length > 3) {
    throw new EntryError("invalid_client_info", `invalid client info length: ${length}`, { length })
  }
}

/** The "client" key, which holds client info as a list of 2 or 3 strings. */
export class Client implements Entry {
  static readonly key = "client"
  readonly kind = "client"
  readonly key = "client"
  readonly value: ClientSlots

  constructor(name?: string, version?: string, extra?: string) {
    this.value = [name, version, extra]
  }

  /**
   * Builds a client entry from loose slots. Up to three slots keep their
   * positions; longer input is compacted to its present values, and more than
   * three present values are rejected.
   */
  static fromSlots(slots: readonly (string | undefined)[]): Client {
    const values = slots.length > 3 ? slots.filter((s) => s !== undefined) : slots
    if (values.length > 3) checkLength(values.length)

    const [name, version, extra] = values
    return new Client(name, version, extra)
  }

  get name(): string | undefined {
    return this.value[0]
  }

  get version(): string | undefined {
    return this.value[1]
  }

  get extra(): string | undefined {
    return this.value[2]
  }

  /** Present slots, in slot order. */
  present(): string[] {
    return this.value.filter((s): s is string => s !== undefined)
  }

  encode(): Uint8Array {
    const values = this.present()
    checkLength(values.length)
    return encode(strings, values)
  }

  static decode(input: Uint8Array): Client {
    const values = decode(strings, input)
    checkLength(values.length)

    const [name, version, extra] = values
    return new Client(name, version, extra)
  }
}
