import type { DecodeErrorCode } from './decode-error.js';
import type { Bech32Variant } from './encoding/bech32-checksum.js';

/**
 * Address classification - closed tagged union.
 *
 * Exactly one variant describes any input string. `invalid` always carries
 * a machine-readable reason code.
 */
export type ValidAddressKind = 'p2pkh' | 'p2sh' | 'segwit_v0' | 'taproot';

export type InvalidReason = DecodeErrorCode;

export type AddressType =
  | { readonly kind: 'p2pkh' }
  | { readonly kind: 'p2sh' }
  | { readonly kind: 'segwit_v0' }
  | { readonly kind: 'taproot' }
  | { readonly kind: 'invalid'; readonly reason: InvalidReason };

export type AddressEncoding = 'base58check' | Bech32Variant;

export type Network = 'mainnet' | 'testnet' | 'regtest' | 'unknown';

/**
 * Successful decode. Created fresh per call; `payload` is a copy, never a
 * view onto caller memory.
 */
export interface DecodedAddress {
  readonly type: Extract<AddressType, { readonly kind: ValidAddressKind }>;
  /** Base58Check version byte, or the witness version for segwit. */
  readonly version: number;
  /** HASH160 for legacy addresses, the witness program for segwit. */
  readonly payload: Uint8Array;
  readonly encoding: AddressEncoding;
  readonly network: Network;
}

export interface InvalidAddress {
  readonly type: Extract<AddressType, { readonly kind: 'invalid' }>;
  readonly message: string;
}

export type AddressClassification = DecodedAddress | InvalidAddress;

export function isValidAddress(c: AddressClassification): c is DecodedAddress {
  return c.type.kind !== 'invalid';
}

/** Decoded but unverified Base58Check content. */
export interface Base58Payload {
  readonly version: number;
  readonly hash: Uint8Array;
  readonly checksum: Uint8Array;
}

/** Bech32 string split into prefix, 5-bit data groups and checksum groups. */
export interface Bech32Decoded {
  /** Lowercased human-readable prefix. */
  readonly prefix: string;
  readonly dataGroups: readonly number[];
  readonly checksumGroups: readonly number[];
}

export interface SegwitProgram {
  readonly witnessVersion: number;
  readonly program: Uint8Array;
}

export const ADDRESS_KIND_LABELS: Readonly<Record<ValidAddressKind, string>> = {
  p2pkh: 'Legacy P2PKH',
  p2sh: 'P2SH',
  segwit_v0: 'Native SegWit bech32',
  taproot: 'Taproot bech32m',
};
