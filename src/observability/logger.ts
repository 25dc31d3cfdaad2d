import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.logLevel,
  base: { service: 'support-ticket-router' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(env.nodeEnv === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Create a child logger bound to one routing run */
export function runLogger(requestId: string, sessionId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, sessionId, ...extra });
}
