/**
 * Check-File Command
 *
 * Classifies every address in a file, one per line.
 * Blank lines and lines starting with '#' are skipped.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse } from '../types/cli-result.js';
import type { BatchReport, ValidateOptions } from '../../application/services/address-validation-service.js';
import type { OutputFormat } from '../../config/app-config.js';
import { EXPECTED_NETWORKS } from '../../config/app-config.js';
import { Err } from '../../errors/factories.js';
import { formatAppError } from '../../errors/formatter.js';
import type { Logger } from '../../core/logging/index.js';
import { parseNetworkFlag, renderBatch } from './validate.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CheckFileCommandDeps {
  readonly readFile: (filePath: string) => Promise<string>;
  readonly validateMany: (addresses: readonly string[], options: ValidateOptions) => BatchReport;
  readonly logger: Logger;
}

export interface CheckFileCommandOptions {
  readonly format: OutputFormat;
  readonly network?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeCheckFileCommand(
  filePath: string,
  options: CheckFileCommandOptions,
  deps: CheckFileCommandDeps
): Promise<CliResult> {
  const network = parseNetworkFlag(options.network);
  if (network.kind === 'invalid') {
    return misuse(`Unknown network: ${network.value}`, [`Use one of: ${EXPECTED_NETWORKS.join(', ')}`]);
  }

  let content: string;
  try {
    content = await deps.readFile(filePath);
  } catch (e: unknown) {
    const error = Err.fileReadFailed(filePath, e);
    deps.logger.error({ err: e, path: filePath }, 'Address file unreadable');
    return failure(formatAppError(error), {
      suggestions: ['Check the file path and permissions'],
    });
  }

  const addresses = parseAddressList(content);
  if (addresses.length === 0) {
    return failure(`No addresses found in ${filePath}`, {
      suggestions: ['Put one address per line; lines starting with # are ignored'],
    });
  }

  deps.logger.debug({ path: filePath, count: addresses.length }, 'Address file loaded');
  return renderBatch(deps.validateMany(addresses, { expectedNetwork: network.value }), options.format);
}

/**
 * One address per line. Surrounding whitespace is trimmed; blank lines and
 * '#' comments are dropped.
 */
export function parseAddressList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
