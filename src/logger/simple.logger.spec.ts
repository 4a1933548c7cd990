import { SimpleLogger } from './simple.logger';

describe('SimpleLogger', () => {
  let logger: SimpleLogger;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logger = new SimpleLogger();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest
      .spyOn(console, 'error')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages with a timestamp and context', () => {
    logger.log('listening', 'Bootstrap');

    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Bootstrap\] listening$/,
      ),
    );
  });

  it('should serialize non-string messages', () => {
    logger.log({ count: 3 });

    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[[^\]]+\] \{"count":3\}$/),
    );
  });

  it('should print the trace after an error', () => {
    logger.error('failed', 'at line 1', 'Parser');

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith(
      expect.stringMatching(/\[Parser\] at line 1$/),
    );
  });

  it('should skip disabled levels', () => {
    logger.setLogLevels(['error']);
    logger.log('hidden');

    expect(logSpy).not.toHaveBeenCalled();
    expect(logger.isLevelEnabled('error')).toBe(true);
  });
});
