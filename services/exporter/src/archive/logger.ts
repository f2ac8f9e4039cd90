import pino from 'pino';

/**
 * Root logger for the exporter. Structured JSON (Pino default) in
 * production, pino-pretty everywhere else.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): pino.Logger {
  return pino({
    name: 'chat-archive',
    level,
    transport: process.env.NODE_ENV !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}

/** Fallback for components constructed without a logger. */
export function defaultLogger(component: string): pino.Logger {
  return pino({ name: `chat-archive:${component}`, level: process.env.LOG_LEVEL ?? 'info' });
}
