/**
 * Property-based tests for address classification.
 *
 * Addresses are generated with the @scure/base encoder and classified with the
 * in-house decoders, so each side checks the other.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import { classifyAddress } from '../../../src/address/classify.js';
import { isValidAddress } from '../../../src/address/address-type.js';
import { BASE58_ALPHABET, BECH32_ALPHABET } from '../../../src/address/constants.js';
import { NodeSha256 } from '../../../src/infra/local/sha256/index.js';
import { ScureAddressEncoder } from '../../../src/infra/local/address-encoder/index.js';

const hasher = new NodeSha256();
const encoder = new ScureAddressEncoder(hasher);
const classify = (address: string) => classifyAddress(address, { hasher });

const arbHash20 = fc.uint8Array({ minLength: 20, maxLength: 20 });
const arbHash32 = fc.uint8Array({ minLength: 32, maxLength: 32 });
const arbPrefix = fc.constantFrom('bc', 'tb', 'bcrt');

describe('classifyAddress (property-based)', () => {
  it('Base58Check P2PKH and P2SH round-trip', () => {
    fc.assert(
      fc.property(fc.constantFrom(0, 5), arbHash20, (version, hash) => {
        const address = encoder.encodeBase58Check(version, hash)._unsafeUnwrap();
        const c = classify(address);
        if (!isValidAddress(c)) return false;
        return (
          c.type.kind === (version === 0 ? 'p2pkh' : 'p2sh') &&
          c.version === version &&
          c.encoding === 'base58check' &&
          Buffer.from(c.payload).equals(Buffer.from(hash))
        );
      }),
      { numRuns: 200 },
    );
  });

  it('witness v0 round-trips for 20 and 32 byte programs', () => {
    fc.assert(
      fc.property(arbPrefix, fc.oneof(arbHash20, arbHash32), (prefix, program) => {
        const address = encoder.encodeSegwit(prefix, 0, program)._unsafeUnwrap();
        const c = classify(address);
        if (!isValidAddress(c)) return false;
        return (
          c.type.kind === 'segwit_v0' &&
          c.encoding === 'bech32' &&
          Buffer.from(c.payload).equals(Buffer.from(program))
        );
      }),
      { numRuns: 200 },
    );
  });

  it('witness v1 round-trips as taproot under bech32m', () => {
    fc.assert(
      fc.property(arbPrefix, arbHash32, (prefix, program) => {
        const address = encoder.encodeSegwit(prefix, 1, program)._unsafeUnwrap();
        const c = classify(address);
        if (!isValidAddress(c)) return false;
        return c.type.kind === 'taproot' && c.encoding === 'bech32m' && Buffer.from(c.payload).equals(Buffer.from(program));
      }),
      { numRuns: 200 },
    );
  });

  it('uppercased segwit addresses classify the same', () => {
    fc.assert(
      fc.property(fc.constantFrom(0, 1), arbHash32, (witnessVersion, program) => {
        const address = encoder.encodeSegwit('bc', witnessVersion, program)._unsafeUnwrap();
        return classify(address.toUpperCase()).type.kind === classify(address).type.kind;
      }),
      { numRuns: 100 },
    );
  });

  it('witness v2-16 are never assigned a type', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 2, max: 16 }),
        fc.uint8Array({ minLength: 2, maxLength: 40 }),
        (witnessVersion, program) => {
          const address = encoder.encodeSegwit('bc', witnessVersion, program)._unsafeUnwrap();
          const c = classify(address);
          return !isValidAddress(c) && c.type.reason === 'UNSUPPORTED_WITNESS_VERSION';
        },
      ),
      { numRuns: 200 },
    );
  });

  it('classification never throws on arbitrary strings', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 120 }), (s) => {
        const c = classify(s);
        return typeof c.type.kind === 'string';
      }),
      { numRuns: 500 },
    );
  });
});

describe('single-character substitutions are rejected', () => {
  const substitutions = (address: string, alphabet: string): string[] => {
    const out: string[] = [];
    for (let i = 0; i < address.length; i++) {
      for (const ch of alphabet) {
        if (ch === address[i]) continue;
        out.push(address.slice(0, i) + ch + address.slice(i + 1));
      }
    }
    return out;
  };

  const cases: ReadonlyArray<readonly [string, string]> = [
    ['1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa', BASE58_ALPHABET],
    ['3J98t1WpEZ73CNmQviecrnyiWrnqRhWNLy', BASE58_ALPHABET],
    ['bc1qxy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlh', BECH32_ALPHABET],
    ['bc1p5d7rjq7g6rdk2yhzks9smlaqtedr4dekq08ge8ztwac72sfr9rusxg3297', BECH32_ALPHABET],
  ];

  it.each(cases)('%s', (address, alphabet) => {
    const accepted = substitutions(address, alphabet).filter((candidate) => isValidAddress(classify(candidate)));
    expect(accepted).toEqual([]);
  });
});
