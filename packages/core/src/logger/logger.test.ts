import { ConsoleLogger, createLogger, defaultLogLevel, isLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages and forward extra arguments', () => {
    const logger = new ConsoleLogger('[test] ', 'debug');

    logger.info('opened', 42);

    expect(logSpy).toHaveBeenCalledWith('[test] opened', 42);
  });

  it('should drop messages below the level', () => {
    const logger = new ConsoleLogger('', 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('shown');
    expect(errorSpy).toHaveBeenCalledWith('shown too');
  });

  it('should log nothing when silent', () => {
    const logger = new ConsoleLogger('', 'silent');

    logger.error('nope');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should change level at runtime', () => {
    const logger = createLogger('', 'error');
    logger.setLevel('debug');

    logger.debug('now visible');

    expect(logger.getLevel()).toBe('debug');
    expect(logSpy).toHaveBeenCalledWith('now visible');
  });

  describe('defaultLogLevel', () => {
    it('should prefer LOG_LEVEL', () => {
      expect(defaultLogLevel({ LOG_LEVEL: 'debug', NODE_ENV: 'test' })).toBe('debug');
    });

    it('should be silent under tests and info otherwise', () => {
      expect(defaultLogLevel({ NODE_ENV: 'test' })).toBe('silent');
      expect(defaultLogLevel({ LOG_LEVEL: 'loud' })).toBe('info');
    });
  });

  it('isLogLevel should recognise level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
