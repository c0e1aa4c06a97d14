import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Contact addresses collected for handoff never reach the log stream
  redact: {
    paths: ['contactEmail', '*.contactEmail', 'escalation.contactEmail', 'email', 'contact_email'],
    censor: '[redacted]',
  },
});

/** Create a child logger with a request / correlation id */
export function childLogger(requestId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, ...extra });
}
