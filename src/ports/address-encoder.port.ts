import type { Result } from 'neverthrow';

export interface AddressEncodeError {
  readonly code: 'ENCODE_INVALID_INPUT';
  readonly message: string;
}

/**
 * Port: address generation (bytes -> address string).
 *
 * The inverse of classification. Encoders choose the checksum variant from
 * the witness version (v0 -> bech32, v1+ -> bech32m); callers cannot pick
 * the wrong one.
 */
export interface AddressEncoderPort {
  /**
   * @param version - Base58Check version byte (0x00 P2PKH, 0x05 P2SH)
   * @param hash - HASH160 of the public key or script
   */
  encodeBase58Check(version: number, hash: Uint8Array): Result<string, AddressEncodeError>;

  /**
   * @param prefix - Human-readable prefix, e.g. 'bc' or 'tb'
   * @param witnessVersion - 0-16
   * @param program - witness program bytes
   */
  encodeSegwit(prefix: string, witnessVersion: number, program: Uint8Array): Result<string, AddressEncodeError>;
}
