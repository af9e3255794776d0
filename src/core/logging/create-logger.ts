import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';

/**
 * Root pino logger.
 *
 * - Sync output to stderr (stdout carries command output, e.g. --json)
 * - JSON format for machine parsing
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      base: { app: 'btc-address' },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
