import * as fs from 'fs';
import * as path from 'path';
import { CommandResult, CommandRunner } from '../services/commandRunner';
import { ManifestConfig } from '../types/config';
import { Logger } from '../utils/logger';
import { ReleaseError, ReleaseStep, StepResult, fail, failureExitCode, ok } from './errors';

/**
 * Reads and writes the version field of the project manifest.
 *
 * Every read and write goes through the external TOML tool, which edits the
 * file in place and keeps its formatting.
 */
export class Manifest {
  private readonly config: ManifestConfig;
  private readonly filePath: string;
  private readonly tomlCommand: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(
    config: ManifestConfig,
    workingDirectory: string,
    tomlCommand: string,
    runner: CommandRunner,
    logger: Logger,
  ) {
    this.config = config;
    this.filePath = path.resolve(workingDirectory, config.path);
    this.tomlCommand = tomlCommand;
    this.runner = runner;
    this.logger = logger;
  }

  public getPath(): string {
    return this.filePath;
  }

  public async readVersion(): Promise<StepResult<string>> {
    const result = await this.getField(this.config.versionKey);

    if (result.exitCode !== 0) {
      return fail(this.toolFailure('read-version', 'get', this.config.versionKey, result.exitCode, result.stderr));
    }

    const version = result.stdout.trim();
    if (!version) {
      return fail(
        new ReleaseError(
          `No value for ${this.config.versionKey} in ${this.config.path}`,
          'PARSE_FAILURE',
          'read-version',
        ),
      );
    }

    this.logger.debug(`Read ${this.config.versionKey} = ${version}`);
    return ok(version);
  }

  public async writeVersion(version: string): Promise<StepResult<void>> {
    const result = await this.runner.run({
      command: this.tomlCommand,
      args: ['set', '--toml-path', this.filePath, this.config.versionKey, version],
      capture: true,
    });

    if (result.exitCode !== 0) {
      return fail(this.toolFailure('write-version', 'set', this.config.versionKey, result.exitCode, result.stderr));
    }

    this.logger.debug(`Wrote ${this.config.versionKey} = ${version}`);
    return ok(undefined);
  }

  public readContent(): string {
    return fs.readFileSync(this.filePath, 'utf-8');
  }

  /**
   * Read the version field back and confirm it holds exactly `expected`.
   */
  public async verify(expected: string): Promise<StepResult<void>> {
    const result = await this.getField(this.config.versionKey);
    if (result.exitCode !== 0) {
      return fail(this.toolFailure('verify', 'get', this.config.versionKey, result.exitCode, result.stderr));
    }

    const actual = result.stdout.trim();
    if (actual !== expected) {
      return fail(
        new ReleaseError(
          `${this.config.versionKey} reads back as "${actual}", expected "${expected}"`,
          'VERIFY_FAILURE',
          'verify',
          1,
          { expected, actual },
        ),
      );
    }

    return ok(undefined);
  }

  /**
   * The package name field, or null when the manifest has none.
   */
  public async packageName(): Promise<string | null> {
    const result = await this.getField(this.config.nameKey);
    const name = result.stdout.trim();

    if (result.exitCode !== 0 || !name) {
      const diagnostic = result.stderr.trim();
      this.logger.warn(`No ${this.config.nameKey} in ${this.config.path}${diagnostic ? `: ${diagnostic}` : ''}`);
      return null;
    }

    return name;
  }

  private getField(key: string): Promise<CommandResult> {
    return this.runner.run({
      command: this.tomlCommand,
      args: ['get', '--toml-path', this.filePath, key],
      capture: true,
    });
  }

  private toolFailure(
    step: ReleaseStep,
    action: string,
    key: string,
    exitCode: number,
    stderr: string,
  ): ReleaseError {
    const diagnostic = stderr.trim();
    return new ReleaseError(
      `${this.tomlCommand} ${action} ${key} failed (exit code ${exitCode})` +
        (diagnostic ? `: ${diagnostic}` : ''),
      'TOOL_FAILURE',
      step,
      failureExitCode(exitCode),
      { manifest: this.filePath },
    );
  }
}
