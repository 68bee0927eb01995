import { BaseError, type ErrorContext } from "@enrkit/errors"

export type EntryErrorCode =
  | "invalid_ip_address"
  | "invalid_ipv4_address"
  | "invalid_ipv6_address"
  | "address_not_ipv4"
  | "address_not_ipv6"
  | "invalid_client_info"
  | "invalid_entry_key"
  | "entries_too_big"

/** A value that cannot be written under, or was read back from, an entry's key. */
export class EntryError extends BaseError<EntryErrorCode> {
  constructor(code: EntryErrorCode, message: string, context: ErrorContext = {}) {
    super(message, { code, context })
  }
}
