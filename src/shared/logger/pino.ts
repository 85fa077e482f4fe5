import { type Logger, pino } from 'pino';

import { loadEnvironment } from '../config/env.js';

let root: Logger | undefined;

export function getLogger(): Logger {
  root ??= pino({
    name: 'glitch-reel',
    level: loadEnvironment().LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return root;
}

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}
