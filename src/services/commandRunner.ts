import { spawn, StdioOptions } from 'child_process';
import { Logger } from '../utils/logger';

export interface CommandSpec {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of passing them through to the terminal */
  capture?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external tools and reports their exit status instead of throwing.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;

  /**
   * Whether `command` resolves to an executable on PATH
   */
  exists(command: string): Promise<boolean>;
}

// Exit status a shell reports for a command it could not find
const NOT_FOUND_EXIT_CODE = 127;

/**
 * CommandRunner backed by child processes. Arguments go to the program as
 * given, never through a shell.
 */
export class ProcessCommandRunner implements CommandRunner {
  private logger: Logger;
  private cwd?: string;

  constructor(logger: Logger, cwd?: string) {
    this.logger = logger;
    this.cwd = cwd;
  }

  public run(spec: CommandSpec): Promise<CommandResult> {
    const args = spec.args ?? [];
    const cwd = spec.cwd ?? this.cwd;
    this.logger.debug(`Running: ${[spec.command, ...args].join(' ')}${cwd ? ` (in ${cwd})` : ''}`);

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        this.logger.debug(`Exited with code ${result.exitCode}: ${spec.command}`);
        resolve(result);
      };

      const stdio: StdioOptions = spec.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit';
      const child = spawn(spec.command, args, {
        cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
        stdio,
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        this.logger.error(`Failed to start ${spec.command}: ${error.message}`);
        finish({
          exitCode: error.code === 'ENOENT' ? NOT_FOUND_EXIT_CODE : 1,
          stdout,
          stderr: stderr || error.message,
        });
      });

      child.on('close', (code, signal) => {
        if (signal) {
          this.logger.warn(`${spec.command} terminated by signal ${signal}`);
        }
        finish({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }

  public async exists(command: string): Promise<boolean> {
    const result = await this.run({
      command: 'sh',
      args: ['-c', 'command -v "$1"', 'sh', command],
      capture: true,
    });
    return result.exitCode === 0 && result.stdout.trim() !== '';
  }
}
