import type { SourceLogger } from '@boardwatch/source-sdk';
import type { Logger } from 'pino';

/**
 * Bridges pino into the logger interface the library packages accept.
 * Library messages without an event key are tagged `source_activity`.
 */
export function createSourceLogger(logger: Logger): SourceLogger {
  const payload = (context?: Record<string, unknown>) => ({ event: 'source_activity', ...context });

  return {
    debug: (message, context) => logger.debug(payload(context), message),
    info: (message, context) => logger.info(payload(context), message),
    warn: (message, context) => logger.warn(payload(context), message),
    error: (message, context) => logger.error(payload(context), message),
  };
}
