import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(level = 'info', destination?: DestinationStream): Logger {
  const options = createLoggerOptions(level);
  return destination ? pino(options, destination) : pino(options);
}
