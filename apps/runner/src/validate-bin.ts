import 'dotenv/config';
import { serializeError, toError } from '@boardwatch/source-sdk';
import { readRunnerConfig, type RunnerConfig } from './config.js';
import { createRunnerLogger } from './observability/logger.js';
import { exitCodeFor, RunStageError, STAGE_EXIT_CODES } from './run.js';
import { formatValidationReport, validateAdapters } from './validate.js';

async function main(): Promise<void> {
  const logger = createRunnerLogger();

  try {
    let config: RunnerConfig;
    try {
      config = readRunnerConfig();
    } catch (error) {
      throw new RunStageError('config', toError(error).message, error);
    }

    const { outcomes } = await validateAdapters(config, { logger });
    for (const line of formatValidationReport(outcomes)) {
      console.log(line);
    }

    const failing = outcomes.some((outcome) => outcome.status === 'failed');
    process.exitCode = failing ? STAGE_EXIT_CODES.scrape : 0;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logger.error(
      {
        event: 'validation_failed',
        stage: error instanceof RunStageError ? error.stage : 'unexpected',
        exitCode,
        error: serializeError(error),
      },
      'Validation failed',
    );
    process.exitCode = exitCode;
  }
}

void main();
