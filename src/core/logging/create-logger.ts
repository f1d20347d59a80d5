import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger.
 *
 * - Sync JSON output to stderr; stdout belongs to the program's own output
 * - ISO timestamps
 * - Error serializer keeps stack traces
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory: creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.LogLevel) level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
