import { Command } from 'commander';
import { CliOptions } from './types/config';
import { VERSION } from './version';

export function parseCliArguments(argv: string[] = process.argv): CliOptions {
  const program = new Command();

  program
    .name('bumpship')
    .description('Bump the patch version of a Python package, clean old artifacts, build and publish it')
    .version(VERSION)
    .option('-c, --config <path>', 'path to a bumpship.toml configuration file')
    .option('--cwd <dir>', 'project directory (default: current directory)')
    .option('--dry-run', 'show the version bump and planned steps without changing anything')
    .option('--verbose', 'enable debug logging')
    .parse(argv);

  const options = program.opts();

  return {
    config: typeof options.config === 'string' ? options.config : undefined,
    cwd: typeof options.cwd === 'string' ? options.cwd : undefined,
    dryRun: options.dryRun === true,
    verbose: options.verbose === true,
  };
}
