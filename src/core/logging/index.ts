export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Registered in the container
export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Before the container exists (config errors, commander failures)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
