/**
 * Validate Command
 *
 * Classifies addresses given on the command line.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, rawFailure, misuse } from '../types/cli-result.js';
import type { BatchReport, ValidateOptions } from '../../application/services/address-validation-service.js';
import type { ExpectedNetwork, OutputFormat } from '../../config/app-config.js';
import { EXPECTED_NETWORKS, isExpectedNetwork } from '../../config/app-config.js';
import { isValidAddress } from '../../address/address-type.js';
import { prefixedWarnings, toDetailLines, toJson, toSummaryLine } from '../report-view.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidateCommandDeps {
  readonly validateMany: (addresses: readonly string[], options: ValidateOptions) => BatchReport;
}

export interface ValidateCommandOptions {
  readonly format: OutputFormat;
  /** Raw --network flag value; checked here. */
  readonly network?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeValidateCommand(
  addresses: readonly string[],
  options: ValidateCommandOptions,
  deps: ValidateCommandDeps
): CliResult {
  if (addresses.length === 0) {
    return misuse('No addresses given', ['Usage: btc-address validate <address...>']);
  }

  const network = parseNetworkFlag(options.network);
  if (network.kind === 'invalid') {
    return misuse(`Unknown network: ${network.value}`, [`Use one of: ${EXPECTED_NETWORKS.join(', ')}`]);
  }

  const batch = deps.validateMany(addresses, { expectedNetwork: network.value });
  return renderBatch(batch, options.format);
}

/**
 * Shared by every command that produces a batch report.
 */
export function renderBatch(batch: BatchReport, format: OutputFormat): CliResult {
  const allValid = batch.summary.invalid === 0;

  if (format === 'json') {
    const text = toJson(batch);
    return allValid ? success({ kind: 'raw', text }) : rawFailure(text);
  }

  const warnings = prefixedWarnings(batch);
  const only = batch.reports.length === 1 ? batch.reports[0] : undefined;

  if (only) {
    if (isValidAddress(only.classification)) {
      return success({ message: toSummaryLine(only), details: toDetailLines(only), warnings });
    }
    return failure(toSummaryLine(only), { details: toDetailLines(only) });
  }

  const { total, valid } = batch.summary;
  const message = `${valid}/${total} addresses valid`;
  const details = batch.reports.map(toSummaryLine);

  return allValid
    ? success({ message, details, warnings })
    : failure(message, { details, warnings });
}

export type NetworkFlag =
  | { readonly kind: 'ok'; readonly value: ExpectedNetwork | undefined }
  | { readonly kind: 'invalid'; readonly value: string };

export function parseNetworkFlag(raw: string | undefined): NetworkFlag {
  if (raw === undefined) return { kind: 'ok', value: undefined };
  const lower = raw.toLowerCase();
  return isExpectedNetwork(lower) ? { kind: 'ok', value: lower } : { kind: 'invalid', value: raw };
}
