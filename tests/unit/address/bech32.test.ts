import { describe, it, expect } from 'vitest';
import { decodeBech32, encodeBech32 } from '../../../src/address/encoding/bech32.js';

describe('decodeBech32', () => {
  it('splits prefix, data groups and checksum groups', () => {
    const decoded = decodeBech32('bc1qxy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlh')._unsafeUnwrap();
    expect(decoded.prefix).toBe('bc');
    expect(decoded.dataGroups.length).toBe(33);
    expect(decoded.dataGroups[0]).toBe(0);
    expect(decoded.checksumGroups.length).toBe(6);
  });

  it('lowercases an all-uppercase string', () => {
    const decoded = decodeBech32('BC1QXY2KGDYGJRSQTZQ2N0YRF2493P83KKFJHX0WLH')._unsafeUnwrap();
    expect(decoded.prefix).toBe('bc');
  });

  it('splits on the LAST separator', () => {
    const decoded = decodeBech32('a1b1qqqqqq')._unsafeUnwrap();
    expect(decoded.prefix).toBe('a1b');
    expect(decoded.dataGroups).toEqual([]);
    expect(decoded.checksumGroups).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('rejects mixed case', () => {
    expect(decodeBech32('bc1QXY2KGDYGJRSQTZQ2N0YRF2493P83KKFJHX0WLH')._unsafeUnwrapErr().code).toBe('MIXED_CASE');
    expect(decodeBech32('bc1qxy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlH')._unsafeUnwrapErr().code).toBe('MIXED_CASE');
  });

  it('rejects a missing separator', () => {
    expect(decodeBech32('bcqxy2kgdygjrsqtzq2n0yrf')._unsafeUnwrapErr().code).toBe('NO_SEPARATOR');
  });

  it('rejects an empty prefix', () => {
    expect(decodeBech32('1qxy2kgdyg')._unsafeUnwrapErr().code).toBe('TOO_SHORT');
  });

  it('rejects a data part shorter than the checksum', () => {
    expect(decodeBech32('bc1qxy2k')._unsafeUnwrapErr().code).toBe('TOO_SHORT');
  });

  it('enforces overall length bounds', () => {
    expect(decodeBech32('')._unsafeUnwrapErr().code).toBe('EMPTY');
    expect(decodeBech32('a1qqqqq')._unsafeUnwrapErr().code).toBe('TOO_SHORT');
    expect(decodeBech32(`bc1${'q'.repeat(88)}`)._unsafeUnwrapErr().code).toBe('TOO_LONG');
  });

  it('accepts exactly 83 characters', () => {
    const decoded = decodeBech32(`bc1${'q'.repeat(80)}`)._unsafeUnwrap();
    expect(decoded.dataGroups).toHaveLength(74);
    expect(decoded.checksumGroups).toHaveLength(6);
  });

  it('rejects 84 characters as TOO_LONG', () => {
    const error = decodeBech32(`bc1${'q'.repeat(81)}`)._unsafeUnwrapErr();
    expect(error.code).toBe('TOO_LONG');
    expect(error.message).toBe('Bech32 string is 84 chars, max 83');
  });

  it('reports alphabet errors before overall length', () => {
    const error = decodeBech32(`bc1${'q'.repeat(85)}b`)._unsafeUnwrapErr();
    expect(error.code).toBe('INVALID_CHARACTER');
    expect(error.position).toBe(88);
  });

  it('counts a long prefix against the total length', () => {
    expect(decodeBech32(`${'a'.repeat(77)}1qqqqqq`)._unsafeUnwrapErr().code).toBe('TOO_LONG');
  });

  it('rejects data characters outside the alphabet with their position', () => {
    const error = decodeBech32('bc1qxy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlb')._unsafeUnwrapErr();
    expect(error.code).toBe('INVALID_CHARACTER');
    expect(error.position).toBe(41);
  });

  it('rejects characters outside printable ASCII', () => {
    const error = decodeBech32('bc1 xy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlh')._unsafeUnwrapErr();
    expect(error.code).toBe('INVALID_CHARACTER');
    expect(error.position).toBe(3);
  });
});

describe('encodeBech32', () => {
  it('produces known strings for both variants', () => {
    expect(encodeBech32('a', [], 'bech32')).toBe('a12uel5l');
    expect(encodeBech32('a', [], 'bech32m')).toBe('a1lqfn3a');
  });

  it('output decodes back to the same groups', () => {
    const s = encodeBech32('tb', [1, 2, 3, 31], 'bech32m');
    const decoded = decodeBech32(s)._unsafeUnwrap();
    expect(decoded.prefix).toBe('tb');
    expect(decoded.dataGroups).toEqual([1, 2, 3, 31]);
  });
});
