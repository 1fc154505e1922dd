import { pino, stdSerializers, type DestinationStream, type Logger } from 'pino';

const REDACT_PATHS = ['token', '*.token', '*.privateKey', '*.d'];

export interface LoggerOptions {
  /** Defaults to LOG_LEVEL, then 'info' */
  level?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Structured JSON logger with ISO timestamps and token redaction.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const config = {
    name,
    level: options.level ?? (process.env.LOG_LEVEL || 'info'),

    formatters: {
      level: (label: string) => ({ level: label }),
    },

    serializers: {
      err: stdSerializers.err,
    },

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
