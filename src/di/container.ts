import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import { NodeSha256 } from '../infra/local/sha256/index.js';
import type { AddressEncoderPort } from '../ports/address-encoder.port.js';
import { ScureAddressEncoder } from '../infra/local/address-encoder/index.js';
import { AddressValidationService } from '../application/services/address-validation-service.js';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'library' };
}

function createTerminator(mode: RuntimeMode): ProcessTerminator {
  switch (mode.kind) {
    case 'test':
      return new ThrowingProcessTerminator();
    case 'cli':
    case 'library':
      return new NodeProcessTerminator();
    default:
      return assertNever(mode);
  }
}

function registerRuntime(mode: RuntimeMode): void {
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: createTerminator(mode) });
  }
}

function registerInfra(): void {
  if (!container.isRegistered(DI.Infra.Sha256)) {
    container.register<Sha256Port>(DI.Infra.Sha256, { useValue: new NodeSha256() });
  }
  container.register<AddressEncoderPort>(DI.Infra.AddressEncoder, {
    useFactory: instanceCachingFactory(
      (c: DependencyContainer) => new ScureAddressEncoder(c.resolve<Sha256Port>(DI.Infra.Sha256)),
    ),
  });
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

function registerServices(): void {
  container.register(DI.Services.AddressValidation, {
    useFactory: instanceCachingFactory((c) => c.resolve(AddressValidationService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the container. Idempotent.
 *
 * Returns the config error instead of exiting; the caller decides how to
 * report it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  const configured = registerConfig(env);
  if (configured.isErr()) return configured;

  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));
  registerInfra();
  registerServices();

  initialized = true;
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Tests only: clear all registrations so the next initialize starts fresh.
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
