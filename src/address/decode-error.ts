/**
 * Decode failures - closed set.
 *
 * Every codec step returns one of these as data (never thrown).
 * Components narrow the union to the codes they can actually produce,
 * so a classifier `switch` over a component error is exhaustive.
 */

export type DecodeErrorCode =
  | 'EMPTY'
  | 'TOO_SHORT'
  | 'TOO_LONG'
  | 'INVALID_CHARACTER'
  | 'MIXED_CASE'
  | 'NO_SEPARATOR'
  | 'CHECKSUM_MISMATCH'
  | 'UNKNOWN_VERSION'
  | 'UNSUPPORTED_WITNESS_VERSION'
  | 'INVALID_WITNESS_VERSION'
  | 'INVALID_PROGRAM_LENGTH'
  | 'PADDING_ERROR'
  | 'NOT_RECOGNIZED';

export interface DecodeError<C extends DecodeErrorCode = DecodeErrorCode> {
  readonly code: C;
  readonly message: string;
  readonly position?: number; // index into the input string, where one applies
}

export type Base58DecodeError = DecodeError<'EMPTY' | 'INVALID_CHARACTER'>;

/** Failures up to and including the checksum. */
export type Base58ChecksumError = DecodeError<'TOO_SHORT'> | DecodeError<'CHECKSUM_MISMATCH'>;
export type Base58PayloadError = Base58DecodeError | Base58ChecksumError;

/** Failures of a checksum-verified payload. */
export type Base58AddressError = DecodeError<'UNKNOWN_VERSION' | 'TOO_SHORT' | 'TOO_LONG'>;

export type Base58CheckError = Base58PayloadError | Base58AddressError;

export type Bech32DecodeError = DecodeError<
  'EMPTY' | 'TOO_SHORT' | 'TOO_LONG' | 'INVALID_CHARACTER' | 'MIXED_CASE' | 'NO_SEPARATOR'
>;

export type SegwitProgramError = DecodeError<
  'INVALID_WITNESS_VERSION' | 'INVALID_PROGRAM_LENGTH' | 'PADDING_ERROR'
>;

export type SegwitAddressError =
  | Bech32DecodeError
  | SegwitProgramError
  | DecodeError<'CHECKSUM_MISMATCH'>;

export function decodeError<C extends DecodeErrorCode>(
  code: C,
  message: string,
  position?: number
): DecodeError<C> {
  return position === undefined ? { code, message } : { code, message, position };
}
