/**
 * Rendering of validation reports for the CLI (text lines and JSON entries).
 */

import type { AddressReport, BatchReport } from '../application/services/address-validation-service.js';
import { ADDRESS_KIND_LABELS, isValidAddress } from '../address/address-type.js';

export interface JsonReportEntry {
  readonly address: string;
  readonly valid: boolean;
  readonly type: string;
  readonly label?: string;
  readonly reason?: string;
  readonly message?: string;
  readonly version?: number;
  readonly payloadHex?: string;
  readonly network?: string;
  readonly encoding?: string;
  readonly warnings: readonly string[];
}

export function toJsonEntry(report: AddressReport): JsonReportEntry {
  const c = report.classification;
  if (!isValidAddress(c)) {
    return {
      address: report.address,
      valid: false,
      type: 'invalid',
      reason: c.type.reason,
      message: c.message,
      warnings: report.warnings,
    };
  }
  return {
    address: report.address,
    valid: true,
    type: c.type.kind,
    label: ADDRESS_KIND_LABELS[c.type.kind],
    version: c.version,
    payloadHex: Buffer.from(c.payload).toString('hex'),
    network: c.network,
    encoding: c.encoding,
    warnings: report.warnings,
  };
}

export function toJson(batch: BatchReport): string {
  return JSON.stringify(batch.reports.map(toJsonEntry), null, 2);
}

/** One-line summary: `<address>: <label>` or `<address>: INVALID (<REASON>)`. */
export function toSummaryLine(report: AddressReport): string {
  const c = report.classification;
  return isValidAddress(c)
    ? `${report.address}: ${ADDRESS_KIND_LABELS[c.type.kind]}`
    : `${report.address}: INVALID (${c.type.reason})`;
}

/** Detail lines for a single-address report. */
export function toDetailLines(report: AddressReport): string[] {
  const c = report.classification;
  if (!isValidAddress(c)) return [c.message];
  return [
    `Network: ${c.network}`,
    `Encoding: ${c.encoding}`,
    c.encoding === 'base58check' ? `Version byte: ${c.version}` : `Witness version: ${c.version}`,
    `Payload: ${Buffer.from(c.payload).toString('hex')}`,
  ];
}

export function prefixedWarnings(batch: BatchReport): string[] {
  return batch.reports.flatMap((r) => r.warnings.map((w) => `${r.address}: ${w}`));
}
