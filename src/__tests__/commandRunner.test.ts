import * as path from 'path';
import { ProcessCommandRunner } from '../services/commandRunner';
import { Logger } from '../utils/logger';
import { createTempDir, createTestLogger, removeTempDir } from './utils/testHelpers';

describe('ProcessCommandRunner', () => {
  let logger: Logger;
  let runner: ProcessCommandRunner;

  beforeEach(() => {
    logger = createTestLogger();
    runner = new ProcessCommandRunner(logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('run', () => {
    it('should capture output and the exit code', async () => {
      const result = await runner.run({
        command: process.execPath,
        args: ['-e', 'process.stdout.write("0.4.9\\n"); process.stderr.write("warned"); process.exit(3)'],
        capture: true,
      });

      expect(result).toEqual({ exitCode: 3, stdout: '0.4.9\n', stderr: 'warned' });
    });

    it('should pass arguments through without a shell', async () => {
      const result = await runner.run({
        command: process.execPath,
        args: ['-e', 'process.stdout.write(process.argv[1])', '$HOME "quoted" ; echo'],
        capture: true,
      });

      expect(result.stdout).toBe('$HOME "quoted" ; echo');
    });

    it('should run in the given working directory with extra env', async () => {
      const dir = createTempDir();
      try {
        const result = await runner.run({
          command: process.execPath,
          args: ['-e', 'process.stdout.write(require("path").basename(process.cwd()) + ":" + process.env.BUMPSHIP_TEST)'],
          cwd: dir,
          env: { BUMPSHIP_TEST: 'yes' },
          capture: true,
        });

        expect(result.stdout).toBe(`${path.basename(dir)}:yes`);
      } finally {
        removeTempDir(dir);
      }
    });

    it('should report 127 when the command does not exist', async () => {
      const result = await runner.run({ command: 'bumpship-no-such-command-12345', capture: true });

      expect(result.exitCode).toBe(127);
    });
  });

  describe('exists', () => {
    it('should find executables on PATH', async () => {
      expect(await runner.exists('sh')).toBe(true);
    });

    it('should not find unknown commands', async () => {
      expect(await runner.exists('bumpship-no-such-command-12345')).toBe(false);
    });
  });
});
