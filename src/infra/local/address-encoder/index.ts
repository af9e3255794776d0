import { bech32, bech32m, createBase58check } from '@scure/base';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { AddressEncoderPort, AddressEncodeError } from '../../../ports/address-encoder.port.js';
import type { Sha256Port } from '../../../ports/sha256.port.js';
import { WITNESS_VERSION_MAX } from '../../../address/constants.js';
import { variantForWitnessVersion } from '../../../address/classify.js';

/**
 * Address encoder using @scure/base.
 *
 * Kept independent of the in-house decoders so that tests can use one to
 * check the other.
 */
export class ScureAddressEncoder implements AddressEncoderPort {
  private readonly base58check: ReturnType<typeof createBase58check>;

  constructor(hasher: Sha256Port) {
    this.base58check = createBase58check((data) => hasher.sha256(data));
  }

  encodeBase58Check(version: number, hash: Uint8Array): Result<string, AddressEncodeError> {
    if (!Number.isInteger(version) || version < 0 || version > 0xff) {
      return err({ code: 'ENCODE_INVALID_INPUT', message: `Version byte out of range: ${version}` });
    }
    const bytes = new Uint8Array(hash.length + 1);
    bytes[0] = version;
    bytes.set(hash, 1);
    return ok(this.base58check.encode(bytes));
  }

  encodeSegwit(prefix: string, witnessVersion: number, program: Uint8Array): Result<string, AddressEncodeError> {
    if (!Number.isInteger(witnessVersion) || witnessVersion < 0 || witnessVersion > WITNESS_VERSION_MAX) {
      return err({ code: 'ENCODE_INVALID_INPUT', message: `Witness version out of range: ${witnessVersion}` });
    }

    const coder = variantForWitnessVersion(witnessVersion) === 'bech32' ? bech32 : bech32m;
    try {
      return ok(coder.encode(prefix, [witnessVersion, ...coder.toWords(program)]));
    } catch (e: unknown) {
      // @scure/base throws on bad prefixes and over-length output
      const msg = e instanceof Error ? e.message : String(e);
      return err({ code: 'ENCODE_INVALID_INPUT', message: `Cannot encode segwit address: ${msg}` });
    }
  }
}
