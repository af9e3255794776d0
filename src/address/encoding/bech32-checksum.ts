import { BECH32_CHECKSUM_GROUPS, BECH32_CONST, BECH32_GENERATORS } from '../constants.js';

/**
 * Checksum variant. `bech32` (BIP-173) covers witness v0, `bech32m`
 * (BIP-350) covers v1 and later. The two are never interchangeable.
 */
export type Bech32Variant = keyof typeof BECH32_CONST;

/**
 * BCH polymod over GF(32).
 *
 * NOTE: the accumulator stays within 30 bits, so 32-bit bitwise ops are safe.
 */
export function bech32Polymod(values: readonly number[]): number {
  let chk = 1;
  for (const v of values) {
    const top = chk >>> 25;
    chk = ((chk & 0x1ffffff) << 5) ^ v;
    BECH32_GENERATORS.forEach((g, i) => {
      if ((top >>> i) & 1) chk ^= g;
    });
  }
  return chk >>> 0;
}

/**
 * Prefix expansion: high 3 bits of each char, a zero, then low 5 bits.
 */
export function expandPrefix(prefix: string): number[] {
  const high: number[] = [];
  const low: number[] = [];
  for (let i = 0; i < prefix.length; i++) {
    const c = prefix.charCodeAt(i);
    high.push(c >> 5);
    low.push(c & 31);
  }
  return [...high, 0, ...low];
}

/**
 * Verify `groups` (data followed by the 6 checksum groups) under one variant.
 */
export function verifyChecksum(prefix: string, groups: readonly number[], variant: Bech32Variant): boolean {
  return bech32Polymod([...expandPrefix(prefix), ...groups]) === BECH32_CONST[variant];
}

/**
 * Compute the 6 checksum groups for `dataGroups` under one variant.
 */
export function createChecksum(prefix: string, dataGroups: readonly number[], variant: Bech32Variant): number[] {
  const values = [...expandPrefix(prefix), ...dataGroups, ...new Array<number>(BECH32_CHECKSUM_GROUPS).fill(0)];
  const mod = bech32Polymod(values) ^ BECH32_CONST[variant];
  const out: number[] = [];
  for (let i = 0; i < BECH32_CHECKSUM_GROUPS; i++) {
    out.push((mod >>> (5 * (BECH32_CHECKSUM_GROUPS - 1 - i))) & 31);
  }
  return out;
}
