#!/usr/bin/env node
/**
 * Pipeline Runner
 *
 * Command-line entry point. Reads configuration from environment variables,
 * runs the pipeline once and exits with a non-zero code on fatal errors.
 *
 * Usage:
 *   FPL_OUTPUT_DIR=./data node dist/src/scripts/run-pipeline.js
 */

import { v4 as uuidv4 } from 'uuid';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { ExitCode, handlePipelineError } from '../middleware/error-handler';
import { createPipeline } from '../index';

/**
 * Run the pipeline with configuration from the environment
 *
 * @returns Process exit code
 */
export async function runPipeline(env: NodeJS.ProcessEnv = process.env): Promise<ExitCode> {
  const runId = uuidv4();

  try {
    const config = loadEnvironmentConfig(env);
    validateEnvironmentConfig(config);

    await createPipeline(config).run(runId);
    return ExitCode.SUCCESS;
  } catch (error) {
    return handlePipelineError(error, runId);
  }
}

if (require.main === module) {
  runPipeline()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = ExitCode.FAILURE;
    });
}
