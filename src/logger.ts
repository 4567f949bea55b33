import pino from 'pino';
import { loadConfig } from './config';

const config = loadConfig();

export type Logger = pino.Logger;

// stderr, so that log lines never interleave with stream output on stdout
const baseLogger: Logger = pino(
  {
    name: config.logName,
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination(2)
);

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}

export { baseLogger as logger };
