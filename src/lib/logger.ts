import pino, { type Logger } from 'pino';

export type { Logger };

// Level is raised or lowered by the worker once the config has been validated.
export const logger: Logger = pino({
  name: 'telemetry-worker',
  level: 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function childLogger(component: string): Logger {
  return logger.child({ component });
}

/** Logger that drops everything; handy for tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
