import type { Result } from 'neverthrow';
import { err } from 'neverthrow';
import type { Sha256Port } from '../ports/sha256.port.js';
import { assertNever } from '../runtime/assert-never.js';
import type { Base58ChecksumError, DecodeError, SegwitAddressError } from './decode-error.js';
import { decodeError } from './decode-error.js';
import type { AddressClassification, DecodedAddress, InvalidAddress, Network } from './address-type.js';
import { addressFromBase58Payload, verifyBase58Check } from './base58check.js';
import { decodeBase58 } from './encoding/base58.js';
import { BASE58CHECK_ADDRESS_LENGTH } from './constants.js';
import { decodeBech32 } from './encoding/bech32.js';
import type { Bech32Variant } from './encoding/bech32-checksum.js';
import { verifyChecksum } from './encoding/bech32-checksum.js';
import { extractSegwitProgram } from './segwit-program.js';

export interface ClassifyDeps {
  readonly hasher: Sha256Port;
}

/**
 * A checksum-verified segwit address, before type assignment.
 */
export interface SegwitAddress {
  readonly prefix: string;
  readonly network: Network;
  readonly variant: Bech32Variant;
  readonly witnessVersion: number;
  readonly program: Uint8Array;
}

/**
 * How far a failed decode path got.
 *
 * 0: not shaped like this scheme at all
 * 1: shaped like it, failed at case, checksum or overall length
 * 2: checksum verified, content rejected
 */
type Evidence = 0 | 1 | 2;

/**
 * Classify a candidate address string. Never throws.
 *
 * Base58Check is tried first and a known version byte ends the search.
 * Then Bech32: the witness version picks the checksum variant (v0 -> bech32,
 * v1+ -> bech32m); the other variant is never tried as a fallback.
 * When both paths fail, the reported reason comes from the path that got
 * furthest. If neither got anywhere, NOT_RECOGNIZED.
 */
export function classifyAddress(address: string, deps: ClassifyDeps): AddressClassification {
  if (address.length === 0) {
    return invalid(decodeError('EMPTY', 'Address is empty'));
  }

  const legacy = tryLegacy(address, deps.hasher);
  if (legacy.isOk()) return legacy.value;

  const segwit = trySegwit(address);
  if (segwit.isOk()) return segwit.value;

  const a = legacy.error;
  const b = segwit.error;

  if (a.evidence === 0 && b.evidence === 0) {
    return invalid(decodeError('NOT_RECOGNIZED', 'Not a Base58Check or Bech32 address'));
  }
  if (b.evidence > a.evidence) return invalid(b.error);
  if (a.evidence > b.evidence) return invalid(a.error);

  // Tie: a known network prefix decides which error to report. It never
  // decides acceptance.
  return invalid(hasKnownBech32Prefix(address) ? b.error : a.error);
}

interface PathFailure {
  readonly error: DecodeError;
  readonly evidence: Evidence;
}

function tryLegacy(address: string, hasher: Sha256Port): Result<DecodedAddress, PathFailure> {
  return decodeBase58(address)
    .mapErr((error): PathFailure => ({ error, evidence: 0 }))
    .andThen((bytes) =>
      verifyBase58Check(bytes, hasher).mapErr(
        (error): PathFailure => ({ error, evidence: base58Evidence(error, bytes.length) }),
      ),
    )
    .andThen((payload) =>
      addressFromBase58Payload(payload).mapErr((error): PathFailure => ({ error, evidence: 2 })),
    );
}

function trySegwit(address: string): Result<AddressClassification, PathFailure> {
  return decodeSegwitAddress(address)
    .mapErr((error): PathFailure => ({ error, evidence: bech32Evidence(error) }))
    .map((segwit): AddressClassification => {
      const base = {
        version: segwit.witnessVersion,
        payload: segwit.program,
        encoding: segwit.variant,
        network: segwit.network,
      };
      switch (segwit.witnessVersion) {
        case 0:
          return { ...base, type: { kind: 'segwit_v0' } };
        case 1:
          return { ...base, type: { kind: 'taproot' } };
        default:
          return invalid(
            decodeError(
              'UNSUPPORTED_WITNESS_VERSION',
              `Witness version ${segwit.witnessVersion} has no assigned address type`,
            ),
          );
      }
    });
}

/**
 * Decode a Bech32/Bech32m segwit address: structure, checksum under the
 * variant the witness version requires, then program.
 */
export function decodeSegwitAddress(address: string): Result<SegwitAddress, SegwitAddressError> {
  return decodeBech32(address).andThen((decoded): Result<SegwitAddress, SegwitAddressError> => {
    const witnessVersion = decoded.dataGroups[0] ?? 0;
    const variant = variantForWitnessVersion(witnessVersion);

    if (!verifyChecksum(decoded.prefix, [...decoded.dataGroups, ...decoded.checksumGroups], variant)) {
      return err(
        decodeError('CHECKSUM_MISMATCH', `${variant} checksum does not match (witness version ${witnessVersion})`),
      );
    }

    return extractSegwitProgram(decoded.dataGroups).map((program) => ({
      prefix: decoded.prefix,
      network: networkForPrefix(decoded.prefix),
      variant,
      witnessVersion: program.witnessVersion,
      program: program.program,
    }));
  });
}

export function variantForWitnessVersion(witnessVersion: number): Bech32Variant {
  return witnessVersion === 0 ? 'bech32' : 'bech32m';
}

export function networkForPrefix(prefix: string): Network {
  switch (prefix.toLowerCase()) {
    case 'bc':
      return 'mainnet';
    case 'tb':
      return 'testnet';
    case 'bcrt':
      return 'regtest';
    default:
      return 'unknown';
  }
}

function hasKnownBech32Prefix(address: string): boolean {
  const sep = address.lastIndexOf('1');
  return sep > 0 && networkForPrefix(address.slice(0, sep)) !== 'unknown';
}

function invalid(error: DecodeError): InvalidAddress {
  return { type: { kind: 'invalid', reason: error.code }, message: error.message };
}

/**
 * A checksum mismatch only counts when the payload has the size of a legacy
 * address; any Base58-alphabet string decodes to some bytes.
 */
function base58Evidence(error: Base58ChecksumError, decodedLength: number): Evidence {
  switch (error.code) {
    case 'TOO_SHORT':
      return 0;
    case 'CHECKSUM_MISMATCH':
      return decodedLength === BASE58CHECK_ADDRESS_LENGTH ? 1 : 0;
    default:
      return assertNever(error);
  }
}

function bech32Evidence(error: SegwitAddressError): Evidence {
  switch (error.code) {
    case 'EMPTY':
    case 'TOO_SHORT':
    case 'INVALID_CHARACTER':
    case 'NO_SEPARATOR':
      return 0;
    case 'TOO_LONG':
    case 'MIXED_CASE':
    case 'CHECKSUM_MISMATCH':
      return 1;
    case 'INVALID_WITNESS_VERSION':
    case 'INVALID_PROGRAM_LENGTH':
    case 'PADDING_ERROR':
      return 2;
    default:
      return assertNever(error);
  }
}
