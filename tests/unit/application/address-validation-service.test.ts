import { describe, it, expect } from 'vitest';
import { AddressValidationService, summarize } from '../../../src/application/services/address-validation-service.js';
import { loadConfig } from '../../../src/config/app-config.js';
import type { ExpectedNetwork } from '../../../src/config/app-config.js';
import { NodeSha256 } from '../../../src/infra/local/sha256/index.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';

const P2PKH = '1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa';
const TESTNET_V0 = 'tb1qw508d6qejxtdg4y5r3zarvary0c5xw7kxpjzsx';
const BAD_CHECKSUM = '1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNb';

function makeService(expectedNetwork: ExpectedNetwork = 'any') {
  const loggers = new FakeLoggerFactory();
  const service = new AddressValidationService(
    new NodeSha256(),
    loggers,
    loadConfig({ env: { BTCADDR_EXPECTED_NETWORK: expectedNetwork } })._unsafeUnwrap(),
  );
  return { service, logger: loggers.getOrCreate('AddressValidationService') };
}

describe('AddressValidationService', () => {
  describe('validate', () => {
    it('reports a valid address without warnings when any network is expected', () => {
      const { service } = makeService();
      const report = service.validate(TESTNET_V0);
      expect(report.address).toBe(TESTNET_V0);
      expect(report.classification.type).toEqual({ kind: 'segwit_v0' });
      expect(report.warnings).toEqual([]);
    });

    it('warns on a network mismatch but keeps the address valid', () => {
      const { service } = makeService('mainnet');
      const report = service.validate(TESTNET_V0);
      expect(report.classification.type.kind).toBe('segwit_v0');
      expect(report.warnings).toEqual(['Address is for testnet, expected mainnet']);
    });

    it('lets the call override the configured network', () => {
      const { service } = makeService('mainnet');
      expect(service.validate(TESTNET_V0, { expectedNetwork: 'testnet' }).warnings).toEqual([]);
      expect(service.validate(TESTNET_V0, { expectedNetwork: 'any' }).warnings).toEqual([]);
    });

    it('never warns on invalid addresses', () => {
      const { service } = makeService('testnet');
      const report = service.validate(BAD_CHECKSUM);
      expect(report.classification.type).toEqual({ kind: 'invalid', reason: 'CHECKSUM_MISMATCH' });
      expect(report.warnings).toEqual([]);
    });

    it('logs acceptance and rejection at debug', () => {
      const { service, logger } = makeService();
      service.validate(P2PKH);
      service.validate(BAD_CHECKSUM);

      const debug = logger.getEntries('debug');
      expect(debug.map((e) => e.msg)).toEqual(['Address accepted', 'Address rejected']);
      expect(debug[0]?.obj).toEqual({ address: P2PKH, kind: 'p2pkh', network: 'mainnet' });
      expect(debug[1]?.obj).toEqual({ address: BAD_CHECKSUM, reason: 'CHECKSUM_MISMATCH' });
    });
  });

  describe('validateMany', () => {
    it('classifies each address independently and summarizes', () => {
      const { service, logger } = makeService();
      const batch = service.validateMany([P2PKH, BAD_CHECKSUM, TESTNET_V0]);

      expect(batch.reports.map((r) => r.classification.type.kind)).toEqual(['p2pkh', 'invalid', 'segwit_v0']);
      expect(batch.summary).toEqual({
        total: 3,
        valid: 2,
        invalid: 1,
        byKind: { p2pkh: 1, p2sh: 0, segwit_v0: 1, taproot: 0, invalid: 1 },
      });
      expect(logger.getEntries('info').map((e) => e.msg)).toEqual(['Batch validated']);
    });
  });

  describe('summarize', () => {
    it('is all zeros for no reports', () => {
      expect(summarize([])).toEqual({
        total: 0,
        valid: 0,
        invalid: 0,
        byKind: { p2pkh: 0, p2sh: 0, segwit_v0: 0, taproot: 0, invalid: 0 },
      });
    });
  });
});
