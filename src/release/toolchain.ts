import { CommandRunner } from '../services/commandRunner';
import { TomlToolConfig } from '../types/config';
import { Logger } from '../utils/logger';
import { ReleaseError, StepResult, fail, failureExitCode, ok } from './errors';

export type ToolStatus = 'present' | 'installed';

/**
 * Makes sure the TOML get/set tool is on PATH, installing it when it isn't.
 */
export class Toolchain {
  private runner: CommandRunner;
  private logger: Logger;

  constructor(runner: CommandRunner, logger: Logger) {
    this.runner = runner;
    this.logger = logger;
  }

  public async ensure(tool: TomlToolConfig): Promise<StepResult<ToolStatus>> {
    if (await this.runner.exists(tool.command)) {
      this.logger.debug(`Found ${tool.command} on PATH`);
      return ok<ToolStatus>('present');
    }

    const installLine = [tool.install.command, ...tool.install.args].join(' ');
    this.logger.warn(`${tool.command} not found, installing with: ${installLine}`);

    const result = await this.runner.run({
      command: tool.install.command,
      args: tool.install.args,
    });

    if (result.exitCode !== 0) {
      return fail(
        new ReleaseError(
          `Installing ${tool.command} failed (exit code ${result.exitCode})`,
          'DEPENDENCY_MISSING',
          'dependencies',
          failureExitCode(result.exitCode),
          { command: installLine },
        ),
      );
    }

    if (!(await this.runner.exists(tool.command))) {
      return fail(
        new ReleaseError(
          `${tool.command} is still not on PATH after running: ${installLine}`,
          'DEPENDENCY_MISSING',
          'dependencies',
        ),
      );
    }

    this.logger.info(`Installed ${tool.command}`);
    return ok<ToolStatus>('installed');
  }
}
