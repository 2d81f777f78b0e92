import * as fs from 'fs';
import * as path from 'path';
import * as toml from 'toml';
import { isContainedPath } from '../release/cleanup';
import { ReleaseError } from '../release/errors';
import { CliOptions, CommandConfig, ReleaseConfig } from '../types/config';
import { LOG_LEVELS, isLogLevel } from '../utils/logger';

export const CONFIG_FILE_NAME = 'bumpship.toml';
export const CONFIG_ENV_VAR = 'BUMPSHIP_CONFIG';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(message: string): ReleaseError {
  return new ReleaseError(message, 'CONFIG_ERROR', 'config');
}

export class ConfigLoader {
  public static getDefaultConfig(workingDirectory: string): ReleaseConfig {
    return {
      workingDirectory,
      manifest: {
        path: 'pyproject.toml',
        versionKey: 'project.version',
        nameKey: 'project.name',
      },
      tools: {
        toml: {
          command: 'toml',
          install: { command: 'pip', args: ['install', 'toml-cli'] },
        },
        build: { command: 'uv', args: ['build'] },
        publish: { command: 'uv', args: ['publish'] },
      },
      cleanup: {
        paths: ['dist/*', 'build/*', '{name}.egg-info', '.mypy_cache', '.ruff_cache'],
      },
      logging: {
        level: 'info',
      },
    };
  }

  /**
   * Loads configuration in priority order:
   * 1. CLI --config parameter
   * 2. BUMPSHIP_CONFIG environment variable
   * 3. ./bumpship.toml in the working directory
   * 4. Built-in defaults
   *
   * Throws ReleaseError with code CONFIG_ERROR.
   */
  public static loadConfig(cliOptions: CliOptions): ReleaseConfig {
    const workingDirectory = path.resolve(cliOptions.cwd ?? process.cwd());
    if (!fs.existsSync(workingDirectory)) {
      throw configError(`Working directory not found: ${workingDirectory}`);
    }

    const config = this.getDefaultConfig(workingDirectory);
    const configPath = this.findConfigPath(cliOptions, workingDirectory);

    if (configPath) {
      this.applyConfigFile(config, configPath);
    }

    if (cliOptions.verbose) {
      config.logging.level = 'debug';
    }

    return config;
  }

  private static findConfigPath(cliOptions: CliOptions, workingDirectory: string): string | null {
    if (cliOptions.config) {
      const resolved = path.resolve(workingDirectory, cliOptions.config);
      if (fs.existsSync(resolved)) {
        return resolved;
      }
      throw configError(`Config file specified via CLI not found: ${cliOptions.config}`);
    }

    const envConfigPath = process.env[CONFIG_ENV_VAR];
    if (envConfigPath) {
      const resolved = path.resolve(workingDirectory, envConfigPath);
      if (fs.existsSync(resolved)) {
        return resolved;
      }
      throw configError(`Config file specified via ${CONFIG_ENV_VAR} env var not found: ${envConfigPath}`);
    }

    const localPath = path.join(workingDirectory, CONFIG_FILE_NAME);
    return fs.existsSync(localPath) ? localPath : null;
  }

  private static applyConfigFile(config: ReleaseConfig, configPath: string): void {
    let parsed: unknown;
    try {
      parsed = toml.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw configError(`Failed to parse config file ${configPath}: ${message}`);
    }

    if (!isTable(parsed)) {
      throw configError(`Config file ${configPath} is not a TOML table`);
    }

    this.applyManifest(config, parsed.manifest);
    this.applyTools(config, parsed.tools);
    this.applyCleanup(config, parsed.cleanup);
    this.applyLogging(config, parsed.logging);
  }

  private static applyManifest(config: ReleaseConfig, section: unknown): void {
    if (section === undefined) return;
    if (!isTable(section)) {
      throw configError('[manifest] must be a table');
    }

    config.manifest.path = this.optionalString(section.path, 'manifest.path') ?? config.manifest.path;
    config.manifest.versionKey =
      this.optionalString(section.versionKey, 'manifest.versionKey') ?? config.manifest.versionKey;
    config.manifest.nameKey = this.optionalString(section.nameKey, 'manifest.nameKey') ?? config.manifest.nameKey;
  }

  private static applyTools(config: ReleaseConfig, section: unknown): void {
    if (section === undefined) return;
    if (!isTable(section)) {
      throw configError('[tools] must be a table');
    }

    const tomlTool = section.toml;
    if (tomlTool !== undefined) {
      if (!isTable(tomlTool)) {
        throw configError('[tools.toml] must be a table');
      }
      config.tools.toml.command =
        this.optionalString(tomlTool.command, 'tools.toml.command') ?? config.tools.toml.command;
      if (tomlTool.install !== undefined) {
        const [command, ...args] = this.stringArray(tomlTool.install, 'tools.toml.install');
        if (!command) {
          throw configError('tools.toml.install must name a command');
        }
        config.tools.toml.install = { command, args };
      }
    }

    config.tools.build = this.commandSection(section.build, 'tools.build', config.tools.build);
    config.tools.publish = this.commandSection(section.publish, 'tools.publish', config.tools.publish);
  }

  private static commandSection(section: unknown, name: string, fallback: CommandConfig): CommandConfig {
    if (section === undefined) return fallback;
    if (!isTable(section)) {
      throw configError(`[${name}] must be a table`);
    }

    const command = this.optionalString(section.command, `${name}.command`);
    const args = section.args === undefined ? undefined : this.stringArray(section.args, `${name}.args`);

    // A new command without args must not inherit the default's args
    if (command !== undefined) {
      return { command, args: args ?? [] };
    }
    return { command: fallback.command, args: args ?? fallback.args };
  }

  private static applyCleanup(config: ReleaseConfig, section: unknown): void {
    if (section === undefined) return;
    if (!isTable(section)) {
      throw configError('[cleanup] must be a table');
    }
    if (section.paths === undefined) return;

    const paths = this.stringArray(section.paths, 'cleanup.paths');
    for (const entry of paths) {
      if (!isContainedPath(entry)) {
        throw configError(`cleanup.paths entry "${entry}" must be a relative path inside the working directory`);
      }
    }
    config.cleanup.paths = paths;
  }

  private static applyLogging(config: ReleaseConfig, section: unknown): void {
    if (section === undefined) return;
    if (!isTable(section)) {
      throw configError('[logging] must be a table');
    }
    if (section.level === undefined) return;

    if (!isLogLevel(section.level)) {
      throw configError(`logging.level must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    config.logging.level = section.level;
  }

  private static optionalString(value: unknown, name: string): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
      throw configError(`${name} must be a non-empty string`);
    }
    return value;
  }

  private static stringArray(value: unknown, name: string): string[] {
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw configError(`${name} must be an array of strings`);
    }
    return value;
  }
}
