import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

/** JSON lines to stdout, or to `destination` (the CLI passes stderr) */
export function createLogger(level: LevelWithSilent = 'info', destination?: DestinationStream): Logger {
  const options = {
    name: 'askdb',
    level,
    base: undefined,
    redact: ['descriptor.password', 'password'],
  };
  return destination ? pino(options, destination) : pino(options);
}
