import { serializeError } from '@boardwatch/source-sdk';
import type { Logger } from 'pino';

export interface WithAdapterLoggerOptions<TResult> {
  logger: Logger;
  adapterKey: string;
  runId: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

export async function withAdapterLogger<TResult>({
  logger,
  adapterKey,
  runId,
  context,
  summary,
  run,
}: WithAdapterLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = {
    adapter: adapterKey,
    runId,
    ...context,
  };

  logger.info(
    {
      event: 'adapter_started',
      ...common,
    },
    'Adapter started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'adapter_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Adapter completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'adapter_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Adapter failed',
    );
    throw error;
  }
}
