import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { Sha256Port } from '../../ports/sha256.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ExpectedNetwork, ValidatedConfig } from '../../config/app-config.js';
import type { AddressClassification, ValidAddressKind } from '../../address/address-type.js';
import { isValidAddress } from '../../address/address-type.js';
import { classifyAddress } from '../../address/classify.js';

export interface AddressReport {
  readonly address: string;
  readonly classification: AddressClassification;
  /** Advisory notes on a valid address (e.g. network mismatch). Never set on invalid ones. */
  readonly warnings: readonly string[];
}

export interface BatchSummary {
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly byKind: Readonly<Record<ValidAddressKind | 'invalid', number>>;
}

export interface BatchReport {
  readonly reports: readonly AddressReport[];
  readonly summary: BatchSummary;
}

export interface ValidateOptions {
  /** Overrides the configured expected network. */
  readonly expectedNetwork?: ExpectedNetwork;
}

/**
 * Address validation service.
 *
 * Wraps the pure classifier with the configured network expectation and
 * logging. Each address is classified independently.
 */
@singleton()
export class AddressValidationService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Infra.Sha256) private readonly hasher: Sha256Port,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
  ) {
    this.logger = loggerFactory.create('AddressValidationService');
  }

  validate(address: string, options: ValidateOptions = {}): AddressReport {
    const classification = classifyAddress(address, { hasher: this.hasher });
    const expected = options.expectedNetwork ?? this.config.validation.expectedNetwork;

    if (!isValidAddress(classification)) {
      this.logger.debug(
        { address, reason: classification.type.reason },
        'Address rejected',
      );
      return { address, classification, warnings: [] };
    }

    const warnings: string[] = [];
    if (expected !== 'any' && classification.network !== expected) {
      warnings.push(`Address is for ${classification.network}, expected ${expected}`);
    }

    this.logger.debug(
      { address, kind: classification.type.kind, network: classification.network },
      'Address accepted',
    );
    return { address, classification, warnings };
  }

  validateMany(addresses: readonly string[], options: ValidateOptions = {}): BatchReport {
    const reports = addresses.map((a) => this.validate(a, options));
    const summary = summarize(reports);

    this.logger.info({ ...summary }, 'Batch validated');
    return { reports, summary };
  }
}

export function summarize(reports: readonly AddressReport[]): BatchSummary {
  const byKind: Record<ValidAddressKind | 'invalid', number> = {
    p2pkh: 0,
    p2sh: 0,
    segwit_v0: 0,
    taproot: 0,
    invalid: 0,
  };
  for (const r of reports) {
    byKind[r.classification.type.kind]++;
  }
  return {
    total: reports.length,
    valid: reports.length - byKind.invalid,
    invalid: byKind.invalid,
    byKind,
  };
}
