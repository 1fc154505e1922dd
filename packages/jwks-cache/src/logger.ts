import { pino, type Logger } from 'pino';

/**
 * Package logger, used when a resolver is built without one.
 */
export const defaultLogger: Logger = pino({
  name: 'jwks-cache',
  level: process.env.LOG_LEVEL || 'info',
});
