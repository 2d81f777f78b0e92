import { Toolchain } from '../release/toolchain';
import { TomlToolConfig } from '../types/config';
import { Logger } from '../utils/logger';
import { FakeCommandRunner, createTestLogger, failure, success } from './utils/testHelpers';

const tomlTool: TomlToolConfig = {
  command: 'toml',
  install: { command: 'pip', args: ['install', 'toml-cli'] },
};

describe('Toolchain', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createTestLogger();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should do nothing when the tool is already on PATH', async () => {
    const runner = new FakeCommandRunner(['toml']);

    const result = await new Toolchain(runner, logger).ensure(tomlTool);

    expect(result).toEqual({ ok: true, value: 'present' });
    expect(runner.calls).toEqual([]);
    expect(runner.existsChecks).toEqual(['toml']);
  });

  it('should install a missing tool and check again', async () => {
    const runner = new FakeCommandRunner([]);
    runner.on('pip', () => {
      runner.makeAvailable('toml');
      return success();
    });
    const warnSpy = jest.spyOn(logger, 'warn');

    const result = await new Toolchain(runner, logger).ensure(tomlTool);

    expect(result).toEqual({ ok: true, value: 'installed' });
    expect(runner.commandLines()).toEqual(['pip install toml-cli']);
    expect(runner.existsChecks).toEqual(['toml', 'toml']);
    expect(warnSpy).toHaveBeenCalledWith('toml not found, installing with: pip install toml-cli');
  });

  it('should fail with the installer exit code when installation fails', async () => {
    const runner = new FakeCommandRunner([]);
    runner.on('pip', () => failure(2, 'network unreachable'));

    const result = await new Toolchain(runner, logger).ensure(tomlTool);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DEPENDENCY_MISSING');
    expect(result.error.step).toBe('dependencies');
    expect(result.error.exitCode).toBe(2);
    expect(result.error.message).toBe('Installing toml failed (exit code 2)');
  });

  it('should fail when the tool is still missing after installing', async () => {
    const runner = new FakeCommandRunner([]);

    const result = await new Toolchain(runner, logger).ensure(tomlTool);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DEPENDENCY_MISSING');
    expect(result.error.exitCode).toBe(1);
    expect(result.error.message).toBe('toml is still not on PATH after running: pip install toml-cli');
  });
});
