import { BaseError, type ErrorContext } from "@enrkit/errors"

export type RlpErrorCode =
  | "rlp_malformed"
  | "rlp_non_canonical_size"
  | "rlp_expected_bytes"
  | "rlp_expected_list"
  | "rlp_wrong_size"
  | "rlp_uint_overflow"
  | "rlp_non_canonical_integer"
  | "rlp_uint_out_of_range"
  | "rlp_invalid_utf8"

export class RlpError extends BaseError<RlpErrorCode> {
  constructor(
    code: RlpErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {},
  ) {
    super(message, { code, ...options })
  }
}
