#!/usr/bin/env node

import { parseCliArguments } from './cli';
import { ConfigLoader } from './config/configLoader';
import { ReleaseError } from './release/errors';
import { ReleasePipeline } from './release/releasePipeline';
import { CommandRunner, ProcessCommandRunner } from './services/commandRunner';
import { Logger } from './utils/logger';

export interface MainDependencies {
  createRunner?: (logger: Logger, cwd: string) => CommandRunner;
  write?: (text: string) => void;
}

/**
 * Runs one release and resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv, deps: MainDependencies = {}): Promise<number> {
  const cliOptions = parseCliArguments(argv);
  const logger = new Logger(cliOptions.verbose ? 'debug' : 'info');

  let pipeline: ReleasePipeline;
  try {
    const config = ConfigLoader.loadConfig(cliOptions);
    logger.setLevel(config.logging.level);

    const createRunner = deps.createRunner ?? ((log, cwd) => new ProcessCommandRunner(log, cwd));
    pipeline = new ReleasePipeline(config, createRunner(logger, config.workingDirectory), logger, deps.write);
  } catch (error) {
    if (error instanceof ReleaseError) {
      logger.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const result = await pipeline.run({ dryRun: cliOptions.dryRun });
  if (!result.ok) {
    logger.error(`Release aborted at ${result.error.step}: ${result.error.message}`);
    return result.error.exitCode;
  }

  if (result.value.dryRun) {
    logger.info(`Dry run complete, nothing changed (${result.value.from} -> ${result.value.to})`);
  }
  return 0;
}

// Only run main if this file is executed directly (not imported)
if (require.main === module) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error('Unhandled error:', error);
      process.exitCode = 1;
    });
}
