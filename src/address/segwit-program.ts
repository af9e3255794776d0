import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import {
  WITNESS_PROGRAM_MAX_LENGTH,
  WITNESS_PROGRAM_MIN_LENGTH,
  WITNESS_V0_PROGRAM_LENGTHS,
  WITNESS_VERSION_MAX,
} from './constants.js';
import type { SegwitProgramError } from './decode-error.js';
import { decodeError } from './decode-error.js';
import type { SegwitProgram } from './address-type.js';

/**
 * Regroup 5-bit values into bytes, strictly.
 *
 * Leftover bits must be fewer than 5 and all zero; anything else means the
 * encoder padded incorrectly (or a group was added or dropped).
 */
export function fiveBitToBytes(groups: readonly number[]): Result<Uint8Array, SegwitProgramError> {
  let acc = 0;
  let bits = 0;
  const out: number[] = [];

  for (const g of groups) {
    acc = ((acc << 5) | g) & 0xfff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out.push((acc >> bits) & 0xff);
    }
  }

  if (bits >= 5) {
    return err(decodeError('PADDING_ERROR', `${bits} leftover bits exceed one group`));
  }
  if ((acc & ((1 << bits) - 1)) !== 0) {
    return err(decodeError('PADDING_ERROR', 'Non-zero padding bits in final group'));
  }

  return ok(new Uint8Array(out));
}

/**
 * Inverse of {@link fiveBitToBytes}: bytes to 5-bit groups, zero-padding the tail.
 */
export function bytesToFiveBit(bytes: Uint8Array): number[] {
  let acc = 0;
  let bits = 0;
  const out: number[] = [];

  for (const b of bytes) {
    acc = ((acc << 8) | b) & 0xfff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      out.push((acc >> bits) & 31);
    }
  }
  if (bits > 0) {
    out.push((acc << (5 - bits)) & 31);
  }
  return out;
}

/**
 * Extract witness version and program from data groups (checksum already
 * removed by the caller).
 */
export function extractSegwitProgram(dataGroups: readonly number[]): Result<SegwitProgram, SegwitProgramError> {
  const witnessVersion = dataGroups[0];
  if (witnessVersion === undefined) {
    return err(decodeError('INVALID_PROGRAM_LENGTH', 'No witness version or program present'));
  }
  if (witnessVersion > WITNESS_VERSION_MAX) {
    return err(decodeError('INVALID_WITNESS_VERSION', `Witness version ${witnessVersion} exceeds ${WITNESS_VERSION_MAX}`));
  }

  return fiveBitToBytes(dataGroups.slice(1)).andThen((program): Result<SegwitProgram, SegwitProgramError> => {
    if (program.length < WITNESS_PROGRAM_MIN_LENGTH || program.length > WITNESS_PROGRAM_MAX_LENGTH) {
      return err(
        decodeError(
          'INVALID_PROGRAM_LENGTH',
          `Witness program is ${program.length} bytes, must be ${WITNESS_PROGRAM_MIN_LENGTH}-${WITNESS_PROGRAM_MAX_LENGTH}`,
        ),
      );
    }
    if (witnessVersion === 0 && !WITNESS_V0_PROGRAM_LENGTHS.includes(program.length)) {
      return err(
        decodeError(
          'INVALID_PROGRAM_LENGTH',
          `Witness v0 program is ${program.length} bytes, must be ${WITNESS_V0_PROGRAM_LENGTHS.join(' or ')}`,
        ),
      );
    }
    return ok({ witnessVersion, program });
  });
}
