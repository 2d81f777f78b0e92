import * as path from 'path';
import { CommandRunner } from '../services/commandRunner';
import { CommandConfig, ReleaseConfig } from '../types/config';
import { Logger } from '../utils/logger';
import { ArtifactCleaner } from './cleanup';
import { ReleaseError, ReleaseStep, StepResult, fail, failureExitCode, ok } from './errors';
import { Manifest } from './manifest';
import { bumpPatch } from './semver';
import { Toolchain } from './toolchain';

export interface ReleaseOptions {
  dryRun?: boolean;
}

export interface ReleaseSummary {
  from: string;
  to: string;
  dryRun: boolean;
  removed: string[];
}

const RULE = '-'.repeat(50);

/**
 * One release: bump the patch version, clean, build, publish.
 *
 * Steps run strictly in order and the first failure ends the run. Nothing is
 * rolled back, so a failed build or publish leaves the manifest bumped.
 */
export class ReleasePipeline {
  private readonly config: ReleaseConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly write: (text: string) => void;
  private readonly manifest: Manifest;
  private readonly toolchain: Toolchain;
  private readonly cleaner: ArtifactCleaner;

  constructor(
    config: ReleaseConfig,
    runner: CommandRunner,
    logger: Logger,
    write: (text: string) => void = (text) => process.stdout.write(text),
  ) {
    this.config = config;
    this.runner = runner;
    this.logger = logger;
    this.write = write;
    this.manifest = new Manifest(config.manifest, config.workingDirectory, config.tools.toml.command, runner, logger);
    this.toolchain = new Toolchain(runner, logger);
    this.cleaner = new ArtifactCleaner(config.workingDirectory, logger);
  }

  public async run(options: ReleaseOptions = {}): Promise<StepResult<ReleaseSummary>> {
    const dryRun = options.dryRun === true;

    const tool = await this.toolchain.ensure(this.config.tools.toml);
    if (!tool.ok) return tool;

    const current = await this.manifest.readVersion();
    if (!current.ok) return current;

    const bump = bumpPatch(current.value);
    if (!bump.ok) return bump;
    const { from, to } = bump.value;

    if (dryRun) {
      this.logger.info(`Would bump version from ${from} to ${to}`);
      this.logger.info(`Would remove: ${this.config.cleanup.paths.join(', ')}`);
      this.logger.info(`Would run: ${this.describe(this.config.tools.build)}`);
      this.logger.info(`Would run: ${this.describe(this.config.tools.publish)}`);
      return ok({ from, to, dryRun, removed: [] });
    }

    this.logger.info(`Bumping version from ${from} to ${to}`);
    this.dumpManifest('before version bump');

    const written = await this.manifest.writeVersion(to);
    if (!written.ok) return written;

    const verified = await this.manifest.verify(to);
    if (!verified.ok) return verified;

    this.dumpManifest('after version bump');

    this.logger.info('Cleaning up old build artifacts and metadata...');
    const packageName = await this.manifest.packageName();
    const cleaned = this.cleaner.clean(this.config.cleanup.paths, packageName);
    if (!cleaned.ok) return cleaned;

    const built = await this.invoke('build', this.config.tools.build);
    if (!built.ok) return built;

    const published = await this.invoke('publish', this.config.tools.publish);
    if (!published.ok) return published;

    this.logger.info(`Successfully published version ${to}.`);
    return ok({ from, to, dryRun, removed: cleaned.value });
  }

  private async invoke(step: ReleaseStep, tool: CommandConfig): Promise<StepResult<void>> {
    const line = this.describe(tool);
    this.logger.info(`Running ${step}: ${line}`);

    const result = await this.runner.run({
      command: tool.command,
      args: tool.args,
      cwd: this.config.workingDirectory,
    });

    if (result.exitCode !== 0) {
      return fail(
        new ReleaseError(
          `${step} failed: ${line} exited with code ${result.exitCode}`,
          'TOOL_FAILURE',
          step,
          failureExitCode(result.exitCode),
          { command: line },
        ),
      );
    }

    return ok(undefined);
  }

  private dumpManifest(label: string): void {
    const name = path.basename(this.manifest.getPath());
    let content: string;
    try {
      content = this.manifest.readContent();
    } catch (error) {
      this.logger.warn(`Could not read ${name}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    const body = content.endsWith('\n') ? content : `${content}\n`;
    this.write(`--- ${name} content ${label} ---\n${body}${RULE}\n`);
  }

  private describe(tool: CommandConfig): string {
    return [tool.command, ...tool.args].join(' ');
  }
}
