import { type DestinationStream, type LevelWithSilent, type Logger as PinoLogger, pino } from 'pino';

/** Logging surface the library writes to. Any pino logger satisfies it. */
export type Logger = Pick<PinoLogger, 'debug' | 'info' | 'warn' | 'error'>;

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /**
   * Minimum level written.
   * @default 'silent'
   */
  level?: LevelWithSilent;
  /**
   * Logger name attached to every line.
   * @default 'typedrest'
   */
  name?: string;
  /** Where lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Creates a pino logger for the client. Silent unless a level is given.
 */
export function createLogger({ level = 'silent', name = 'typedrest', destination }: LoggerOptions = {}): PinoLogger {
  if (destination) {
    return pino({ name, level }, destination);
  }

  return pino({ name, level });
}

/** Logger used when the caller configures none. */
export const silentLogger: Logger = createLogger();
