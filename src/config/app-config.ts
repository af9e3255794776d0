/**
 * Application configuration - parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Config surface
// =============================================================================

export type ExpectedNetwork = 'mainnet' | 'testnet' | 'regtest' | 'any';
export type OutputFormat = 'text' | 'json';

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly validation: { readonly expectedNetwork: ExpectedNetwork };
  readonly output: { readonly format: OutputFormat };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export const EXPECTED_NETWORKS = ['mainnet', 'testnet', 'regtest', 'any'] as const;
export const OUTPUT_FORMATS = ['text', 'json'] as const;

const EnvSchema = z.object({
  BTCADDR_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  BTCADDR_EXPECTED_NETWORK: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(EXPECTED_NETWORKS).default('any')),

  BTCADDR_OUTPUT: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(OUTPUT_FORMATS).default('text')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export function isExpectedNetwork(value: string): value is ExpectedNetwork {
  return (EXPECTED_NETWORKS as readonly string[]).includes(value);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.BTCADDR_LOG_LEVEL },
    validation: { expectedNetwork: env.BTCADDR_EXPECTED_NETWORK },
    output: { format: env.BTCADDR_OUTPUT },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
