/**
 * Address format constants.
 *
 * Any change here changes which strings are accepted. Values follow
 * BIP-13 (P2SH versioning), BIP-173 (Bech32) and BIP-350 (Bech32m).
 */

/** Bitcoin Base58 alphabet: no `0`, `O`, `I` or `l`. */
export const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz' as const;

/** Bech32 data alphabet; index = 5-bit value. */
export const BECH32_ALPHABET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l' as const;

export const BECH32_SEPARATOR = '1' as const;

export const BASE58CHECK_CHECKSUM_LENGTH = 4;

/** Decoded Base58Check minimum: version byte + checksum. */
export const BASE58CHECK_MIN_LENGTH = 1 + BASE58CHECK_CHECKSUM_LENGTH;

/** HASH160 length carried by P2PKH and P2SH. */
export const BASE58CHECK_HASH_LENGTH = 20;

/** Decoded size of a P2PKH or P2SH address: version + hash + checksum. */
export const BASE58CHECK_ADDRESS_LENGTH = 1 + BASE58CHECK_HASH_LENGTH + BASE58CHECK_CHECKSUM_LENGTH;

export const BASE58_VERSION = {
  p2pkh: 0x00,
  p2sh: 0x05,
} as const;

export const BECH32_CHECKSUM_GROUPS = 6;
/** Prefix, separator and data together. */
export const BECH32_MAX_LENGTH = 83;

/** Smallest well-formed string: one prefix char, separator, checksum. */
export const BECH32_MIN_LENGTH = 1 + 1 + BECH32_CHECKSUM_GROUPS;

export const BECH32_GENERATORS = [0x3b6a57b2, 0x26508e6d, 0x1ea119fa, 0x3d4233dd, 0x2a1462b3] as const;

/** Final polymod value for a valid checksum, per variant. */
export const BECH32_CONST = {
  bech32: 1,
  bech32m: 0x2bc830a3,
} as const;

export const WITNESS_VERSION_MAX = 16;
export const WITNESS_PROGRAM_MIN_LENGTH = 2;
export const WITNESS_PROGRAM_MAX_LENGTH = 40;
export const WITNESS_V0_PROGRAM_LENGTHS: readonly number[] = [20, 32];
