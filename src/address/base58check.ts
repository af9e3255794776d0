import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Sha256Port } from '../ports/sha256.port.js';
import {
  BASE58CHECK_CHECKSUM_LENGTH,
  BASE58CHECK_HASH_LENGTH,
  BASE58CHECK_MIN_LENGTH,
  BASE58_VERSION,
} from './constants.js';
import type {
  Base58AddressError,
  Base58CheckError,
  Base58ChecksumError,
  Base58PayloadError,
} from './decode-error.js';
import { decodeError } from './decode-error.js';
import { decodeBase58 } from './encoding/base58.js';
import type { Base58Payload, DecodedAddress } from './address-type.js';

/**
 * First four bytes of SHA-256(SHA-256(bytes)).
 */
export function base58CheckChecksum(bytes: Uint8Array, hasher: Sha256Port): Uint8Array {
  return hasher.sha256(hasher.sha256(bytes)).slice(0, BASE58CHECK_CHECKSUM_LENGTH);
}

/**
 * Decode a Base58Check string and verify its checksum.
 *
 * Does not look at the version byte or the hash length; see
 * {@link validateBase58Check} for the address-level rules.
 */
export function decodeBase58Check(
  encoded: string,
  hasher: Sha256Port
): Result<Base58Payload, Base58PayloadError> {
  return decodeBase58(encoded).andThen((bytes) => verifyBase58Check(bytes, hasher));
}

/**
 * Split already-decoded Base58 bytes into version, hash and checksum, and
 * verify the checksum.
 */
export function verifyBase58Check(
  bytes: Uint8Array,
  hasher: Sha256Port
): Result<Base58Payload, Base58ChecksumError> {
  if (bytes.length < BASE58CHECK_MIN_LENGTH) {
    return err(
      decodeError(
        'TOO_SHORT',
        `Base58Check payload is ${bytes.length} bytes, need at least ${BASE58CHECK_MIN_LENGTH}`,
      ),
    );
  }

  const split = bytes.length - BASE58CHECK_CHECKSUM_LENGTH;
  const versioned = bytes.slice(0, split);
  const checksum = bytes.slice(split);

  const expected = base58CheckChecksum(versioned, hasher);
  if (!bytesEqual(expected, checksum)) {
    return err(decodeError('CHECKSUM_MISMATCH', 'Base58Check checksum does not match payload'));
  }

  return ok({
    version: versioned[0] ?? 0,
    hash: versioned.slice(1),
    checksum,
  });
}

/**
 * Map a checksum-verified payload to a legacy address type.
 *
 * The version byte is checked before the hash length, so an unknown version
 * is reported as such whatever its length.
 */
export function addressFromBase58Payload(
  payload: Base58Payload
): Result<DecodedAddress, Base58AddressError> {
  let kind: 'p2pkh' | 'p2sh';
  switch (payload.version) {
    case BASE58_VERSION.p2pkh:
      kind = 'p2pkh';
      break;
    case BASE58_VERSION.p2sh:
      kind = 'p2sh';
      break;
    default:
      return err(
        decodeError('UNKNOWN_VERSION', `Unknown Base58Check version byte 0x${hex2(payload.version)}`),
      );
  }

  if (payload.hash.length !== BASE58CHECK_HASH_LENGTH) {
    const code = payload.hash.length < BASE58CHECK_HASH_LENGTH ? 'TOO_SHORT' : 'TOO_LONG';
    return err(
      decodeError(code, `Hash is ${payload.hash.length} bytes, expected ${BASE58CHECK_HASH_LENGTH}`),
    );
  }

  return ok({
    type: { kind },
    version: payload.version,
    payload: payload.hash,
    encoding: 'base58check',
    network: 'mainnet',
  });
}

/**
 * Validate a legacy (P2PKH / P2SH) address: checksum, then version byte,
 * then hash length. A bad checksum is always reported as such.
 */
export function validateBase58Check(
  encoded: string,
  hasher: Sha256Port
): Result<DecodedAddress, Base58CheckError> {
  return decodeBase58Check(encoded, hasher).andThen(
    (payload): Result<DecodedAddress, Base58CheckError> => addressFromBase58Payload(payload),
  );
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function hex2(n: number): string {
  return n.toString(16).padStart(2, '0');
}
