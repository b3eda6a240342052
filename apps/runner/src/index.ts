import 'dotenv/config';
import { serializeError, toError } from '@boardwatch/source-sdk';
import { readRunnerConfig, type RunnerConfig } from './config.js';
import { createRunnerLogger } from './observability/logger.js';
import { exitCodeFor, RunStageError, runTracker } from './run.js';

async function main(): Promise<void> {
  const logger = createRunnerLogger();

  try {
    let config: RunnerConfig;
    try {
      config = readRunnerConfig();
    } catch (error) {
      throw new RunStageError('config', toError(error).message, error);
    }

    await runTracker(config, { logger });
    process.exitCode = 0;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logger.error(
      {
        event: 'run_failed',
        stage: error instanceof RunStageError ? error.stage : 'unexpected',
        exitCode,
        error: serializeError(error),
      },
      'Run failed',
    );
    process.exitCode = exitCode;
  }
}

void main();
