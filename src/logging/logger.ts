import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  level?: LogLevel;
  prettyPrint?: boolean;
  name?: string;
  destination?: pino.DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = 'info', prettyPrint = false, name, destination } = options;

  const pinoOptions: pino.LoggerOptions = { level };
  if (name) {
    pinoOptions.name = name;
  }

  // A transport runs in a worker and cannot share an explicit destination.
  if (prettyPrint && !destination) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
    return pino(pinoOptions);
  }

  return destination ? pino(pinoOptions, destination) : pino(pinoOptions, pino.destination(2));
}

let fallback: Logger | undefined;

/** Logger used by nodes and orchestrators that were not handed one. */
export function defaultLogger(): Logger {
  fallback ??= createLogger({ name: 'evaluators', level: 'warn' });
  return fallback;
}
