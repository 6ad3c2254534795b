import pino, { type Bindings, type Logger } from 'pino';

import { readEnvironment } from '../config/environment.js';

const level = readEnvironment().LOG_LEVEL;

// stdout belongs to the avatar and progress output.
export const logger: Logger = pino(
  {
    name: 'tty-scrape',
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true }),
);

export function createChildLogger(bindings: Bindings): Logger {
  return logger.child(bindings);
}
