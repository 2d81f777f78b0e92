import type { LogLevel } from '../utils/logger';

export interface CommandConfig {
  command: string;
  args: string[];
}

export interface TomlToolConfig {
  command: string; // Executable of the TOML get/set tool, looked up on PATH
  install: CommandConfig; // Run when the executable is missing
}

export interface ManifestConfig {
  path: string; // Relative to the working directory
  versionKey: string; // Dotted key, e.g. "project.version"
  nameKey: string; // Dotted key of the package name, used for {name} in cleanup paths
}

export interface ReleaseConfig {
  workingDirectory: string;
  manifest: ManifestConfig;
  tools: {
    toml: TomlToolConfig;
    build: CommandConfig;
    publish: CommandConfig;
  };
  cleanup: {
    paths: string[];
  };
  logging: {
    level: LogLevel;
  };
}

export interface CliOptions {
  config?: string;
  cwd?: string;
  dryRun?: boolean;
  verbose?: boolean;
}
