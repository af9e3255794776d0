#!/usr/bin/env node
/**
 * btc-address CLI - Composition Root
 *
 * 1. Loads configuration and wires dependencies
 * 2. Interprets CliResult into process termination
 * 3. Contains NO validation logic (see src/address and src/cli/commands)
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig, OutputFormat } from './config/app-config.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { AddressValidationService } from './application/services/address-validation-service.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { createBootstrapLogger } from './core/logging/index.js';
import { formatAppError } from './errors/formatter.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { misuse } from './cli/types/cli-result.js';
import { executeValidateCommand, executeCheckFileCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Wired {
  readonly config: ValidatedConfig;
  readonly terminator: ProcessTerminator;
  readonly service: AddressValidationService;
  readonly loggerFactory: ILoggerFactory;
}

function wire(): Wired | null {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    createBootstrapLogger('cli').error({ issues: initialized.error.issues }, 'Invalid configuration');
    interpretCliResultWithoutDI(misuse(formatAppError(initialized.error)));
    return null;
  }

  return {
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    service: container.resolve<AddressValidationService>(DI.Services.AddressValidation),
    loggerFactory: container.resolve<ILoggerFactory>(DI.Logging.Factory),
  };
}

function outputFormat(json: boolean | undefined, config: ValidatedConfig): OutputFormat {
  return json ? 'json' : config.output.format;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

interface CommonOptions {
  json?: boolean;
  network?: string;
}

const program = new Command();

program
  .name('btc-address')
  .description('Validate Bitcoin addresses and report their type')
  .version('0.1.0');

program
  .command('validate <address...>')
  .description('Validate one or more addresses')
  .option('--json', 'Print a JSON report on stdout')
  .option('-n, --network <network>', 'Expected network: mainnet, testnet, regtest or any')
  .action((addresses: string[], options: CommonOptions) => {
    const wired = wire();
    if (!wired) return;

    const result = executeValidateCommand(
      addresses,
      { format: outputFormat(options.json, wired.config), network: options.network },
      { validateMany: (list, opts) => wired.service.validateMany(list, opts) },
    );

    interpretCliResult(result, wired.terminator);
  });

program
  .command('check-file <file>')
  .description('Validate every address in a file (one per line, # for comments)')
  .option('--json', 'Print a JSON report on stdout')
  .option('-n, --network <network>', 'Expected network: mainnet, testnet, regtest or any')
  .action(async (filePath: string, options: CommonOptions) => {
    const wired = wire();
    if (!wired) return;

    const result = await executeCheckFileCommand(
      filePath,
      { format: outputFormat(options.json, wired.config), network: options.network },
      {
        readFile: (p) => fs.promises.readFile(p, 'utf-8'),
        validateMany: (list, opts) => wired.service.validateMany(list, opts),
        logger: wired.loggerFactory.create('check-file'),
      },
    );

    interpretCliResult(result, wired.terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.exitOverride((error) => {
  // commander reports usage errors itself; map them to the misuse exit code
  process.exit(error.exitCode === 0 ? 0 : 2);
});

program.parseAsync().catch((e: unknown) => {
  createBootstrapLogger('cli').fatal({ err: e }, 'Unhandled CLI error');
  process.exit(1);
});
