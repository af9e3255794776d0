import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { BASE58_ALPHABET } from '../constants.js';
import type { Base58DecodeError } from '../decode-error.js';
import { decodeError } from '../decode-error.js';

const BASE58_LOOKUP: ReadonlyMap<string, number> = new Map(
  BASE58_ALPHABET.split('').map((c, i) => [c, i] as const),
);

const ZERO_CHAR = BASE58_ALPHABET[0];

/**
 * Decode a Base58 string (Bitcoin alphabet) to bytes.
 *
 * The string is read as a big-endian base-58 integer. Each leading `1`
 * becomes one leading zero byte; without that the version byte of a P2PKH
 * address (0x00) would vanish.
 */
export function decodeBase58(encoded: string): Result<Uint8Array, Base58DecodeError> {
  if (encoded.length === 0) {
    return err(decodeError('EMPTY', 'Base58 input is empty'));
  }

  // Little-endian working buffer; grows as the integer grows.
  const acc: number[] = [];

  let position = 0;
  for (const char of encoded) {
    const digit = BASE58_LOOKUP.get(char);
    if (digit === undefined) {
      return err(decodeError('INVALID_CHARACTER', `Invalid base58 character: '${char}'`, position));
    }

    let carry = digit;
    for (let i = 0; i < acc.length; i++) {
      carry += (acc[i] ?? 0) * 58;
      acc[i] = carry & 0xff;
      carry >>= 8;
    }
    while (carry > 0) {
      acc.push(carry & 0xff);
      carry >>= 8;
    }
    position++;
  }

  let leadingZeros = 0;
  while (leadingZeros < encoded.length && encoded[leadingZeros] === ZERO_CHAR) {
    leadingZeros++;
  }

  // A run of leading `1`s contributes nothing to the integer, so acc holds
  // only the significant bytes.
  const bytes = new Uint8Array(leadingZeros + acc.length);
  for (let i = 0; i < acc.length; i++) {
    bytes[bytes.length - 1 - i] = acc[i] ?? 0;
  }

  return ok(bytes);
}
