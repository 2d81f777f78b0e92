import { Logger, isLogLevel } from '../utils/logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should default to info level', () => {
    const logger = new Logger();

    expect(logger.getLevel()).toBe('info');
    expect(logger.isDebugEnabled()).toBe(false);
  });

  it('should change level with setLevel', () => {
    const logger = new Logger('warn');
    logger.setLevel('debug');

    expect(logger.isDebugEnabled()).toBe(true);
  });

  it('should write debug and info lines to stdout', () => {
    const logger = new Logger('debug');
    logger.debug('reading manifest');
    logger.info('bumping version');

    expect(logSpy).toHaveBeenNthCalledWith(1, expect.stringMatching(/^\[.*\] DEBUG reading manifest$/));
    expect(logSpy).toHaveBeenNthCalledWith(2, expect.stringMatching(/^\[.*\] INFO {2}bumping version$/));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should write warnings and errors to stderr', () => {
    const logger = new Logger('info');
    logger.warn('tool missing');
    logger.error('build failed');

    expect(errorSpy).toHaveBeenNthCalledWith(1, expect.stringMatching(/^\[.*\] WARN {2}tool missing$/));
    expect(errorSpy).toHaveBeenNthCalledWith(2, expect.stringMatching(/^\[.*\] ERROR build failed$/));
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should drop messages below the configured level', () => {
    const logger = new Logger('error');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should pass extra arguments through', () => {
    const logger = new Logger('info');
    const details = { step: 'build' };
    logger.info('context', details);

    expect(logSpy).toHaveBeenCalledWith(expect.stringMatching(/INFO {2}context$/), details);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
