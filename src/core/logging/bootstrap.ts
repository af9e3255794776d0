import type { Logger } from './types.js';
import { createRootLogger } from './create-logger.js';
import { LOG_LEVELS } from '../../config/app-config.js';

/**
 * Logger for code that runs BEFORE the DI container (config loading,
 * argument parsing). After DI is ready, use the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const raw = process.env['BTCADDR_LOG_LEVEL']?.toLowerCase();
    const level = LOG_LEVELS.find((l) => l === raw) ?? 'silent';
    _bootstrapLogger = createRootLogger(level);
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
