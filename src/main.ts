#!/usr/bin/env node
/**
 * Entry Point
 * Runs the proxy update pipeline once and sets the exit code
 */

import { createPipeline } from './app';
import { env } from './config/env';
import { loadPipelineOptions } from './config/pipeline.config';
import { PersistenceError, describeError } from './lib/errors';
import { createLogger } from './lib/logger';

const main = async (): Promise<number> => {
  const logger = createLogger({ level: env.LOG_LEVEL, file: env.LOG_FILE || undefined });

  try {
    const options = loadPipelineOptions(env);
    const pipeline = createPipeline(options, logger);
    await pipeline.run();
    return 0;
  } catch (error) {
    if (error instanceof PersistenceError) {
      logger.error('Failed to persist configuration', {
        path: error.path,
        error: error.message,
        cause: describeError(error.cause),
      });
    } else {
      logger.error('Proxy update cycle failed', {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return 1;
  }
};

void main().then((code) => {
  process.exitCode = code;
});
