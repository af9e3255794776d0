import 'reflect-metadata';
/**
 * Library entry point.
 *
 * `validateAddress` is the zero-setup path: the pure classifier with Node's
 * SHA-256. Everything else is exported for callers that wire their own.
 */

import { classifyAddress } from './address/classify.js';
import type { AddressClassification } from './address/address-type.js';
import { NodeSha256 } from './infra/local/sha256/index.js';

export * from './address/index.js';
export type { Sha256Port } from './ports/sha256.port.js';
export type { AddressEncoderPort, AddressEncodeError } from './ports/address-encoder.port.js';
export { NodeSha256 } from './infra/local/sha256/index.js';
export { ScureAddressEncoder } from './infra/local/address-encoder/index.js';

// DI container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
export { AddressValidationService } from './application/services/address-validation-service.js';
export type { AddressReport, BatchReport, BatchSummary, ValidateOptions } from './application/services/address-validation-service.js';
export type { AppConfig, ValidatedConfig, ExpectedNetwork, OutputFormat } from './config/app-config.js';
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppError, ConfigIssue, ConfigInvalidError, FileReadFailedError, UnexpectedError } from './errors/index.js';
export { formatAppError } from './errors/index.js';

const nodeSha256 = new NodeSha256();

export function validateAddress(address: string): AddressClassification {
  return classifyAddress(address, { hasher: nodeSha256 });
}
