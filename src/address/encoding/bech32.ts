import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import {
  BECH32_ALPHABET,
  BECH32_CHECKSUM_GROUPS,
  BECH32_MAX_LENGTH,
  BECH32_MIN_LENGTH,
  BECH32_SEPARATOR,
} from '../constants.js';
import type { Bech32DecodeError } from '../decode-error.js';
import { decodeError } from '../decode-error.js';
import type { Bech32Decoded } from '../address-type.js';
import type { Bech32Variant } from './bech32-checksum.js';
import { createChecksum } from './bech32-checksum.js';

const BECH32_LOOKUP: ReadonlyMap<string, number> = new Map(
  BECH32_ALPHABET.split('').map((c, i) => [c, i] as const),
);

/**
 * Split a Bech32/Bech32m string into prefix, data groups and checksum groups.
 *
 * Structure only: the checksum is NOT verified here, because the variant
 * depends on the witness version the caller reads from the data.
 *
 * Checks run in a fixed order (minimum length, character range, separator,
 * data alphabet, case, maximum length) so a string that is Bech32-shaped
 * apart from its case is reported as MIXED_CASE rather than as an alphabet
 * error.
 */
export function decodeBech32(encoded: string): Result<Bech32Decoded, Bech32DecodeError> {
  if (encoded.length === 0) {
    return err(decodeError('EMPTY', 'Bech32 input is empty'));
  }
  if (encoded.length < BECH32_MIN_LENGTH) {
    return err(decodeError('TOO_SHORT', `Bech32 string is ${encoded.length} chars, min ${BECH32_MIN_LENGTH}`));
  }

  for (let i = 0; i < encoded.length; i++) {
    const code = encoded.charCodeAt(i);
    if (code < 33 || code > 126) {
      return err(decodeError('INVALID_CHARACTER', `Character code ${code} is outside printable ASCII`, i));
    }
  }

  const lower = encoded.toLowerCase();
  const sep = lower.lastIndexOf(BECH32_SEPARATOR);
  if (sep === -1) {
    return err(decodeError('NO_SEPARATOR', `Missing separator '${BECH32_SEPARATOR}'`));
  }
  if (sep === 0) {
    return err(decodeError('TOO_SHORT', 'Human-readable prefix is empty'));
  }
  if (lower.length - sep - 1 < BECH32_CHECKSUM_GROUPS) {
    return err(decodeError('TOO_SHORT', `Data part is shorter than the ${BECH32_CHECKSUM_GROUPS}-char checksum`));
  }

  const groups: number[] = [];
  for (let i = sep + 1; i < lower.length; i++) {
    const char = lower.charAt(i);
    const value = BECH32_LOOKUP.get(char);
    if (value === undefined) {
      return err(decodeError('INVALID_CHARACTER', `Invalid bech32 character: '${encoded.charAt(i)}'`, i));
    }
    groups.push(value);
  }

  if (lower !== encoded && encoded.toUpperCase() !== encoded) {
    return err(decodeError('MIXED_CASE', 'Bech32 string mixes upper and lower case'));
  }

  // Checked last: TOO_LONG means Bech32-shaped but over the limit.
  if (encoded.length > BECH32_MAX_LENGTH) {
    return err(decodeError('TOO_LONG', `Bech32 string is ${encoded.length} chars, max ${BECH32_MAX_LENGTH}`));
  }

  const split = groups.length - BECH32_CHECKSUM_GROUPS;
  return ok({
    prefix: lower.slice(0, sep),
    dataGroups: groups.slice(0, split),
    checksumGroups: groups.slice(split),
  });
}

/**
 * Build a lowercase Bech32/Bech32m string from a prefix and 5-bit data groups.
 */
export function encodeBech32(prefix: string, dataGroups: readonly number[], variant: Bech32Variant): string {
  const hrp = prefix.toLowerCase();
  const all = [...dataGroups, ...createChecksum(hrp, dataGroups, variant)];
  return `${hrp}${BECH32_SEPARATOR}${all.map((g) => BECH32_ALPHABET.charAt(g)).join('')}`;
}
