import { Logger } from '../../../../services/core/Logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    logger = new Logger('PanelApiClient');
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    consoleLogSpy.mockClear();
    consoleErrorSpy.mockClear();
    consoleWarnSpy.mockClear();
  });

  afterEach(() => {
    jest.useRealTimers();
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  it('writes info lines to stdout in the structured format', () => {
    logger.info('Panel user created', { username: 'user_42_1700000000' });

    expect(consoleLogSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [INFO] [PanelApiClient] Panel user created {"username":"user_42_1700000000"}'
    );
  });

  it('omits the metadata block when there is none', () => {
    logger.info('Subscription core ready');

    expect(consoleLogSpy).toHaveBeenCalledWith('[2024-01-01T00:00:00.000Z] [INFO] [PanelApiClient] Subscription core ready');
  });

  it('routes errors and warnings to stderr', () => {
    logger.error('Panel call failed after retries', { attempts: 3 });
    logger.warn('Panel call retry', { attempt: 1 });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [ERROR] [PanelApiClient] Panel call failed after retries {"attempts":3}'
    );
    expect(consoleWarnSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [WARN] [PanelApiClient] Panel call retry {"attempt":1}'
    );
  });

  it('prints debug lines only when LOG_LEVEL=debug', () => {
    process.env.LOG_LEVEL = 'info';
    logger.debug('Cache hit', { key: 'status:42' });
    expect(consoleLogSpy).not.toHaveBeenCalled();

    process.env.LOG_LEVEL = 'DEBUG';
    logger.debug('Cache hit', { key: 'status:42' });
    expect(consoleLogSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [DEBUG] [PanelApiClient] Cache hit {"key":"status:42"}'
    );
  });

  it('merges the trace context into every line', () => {
    const scoped = logger.withContext({ traceId: 'trace-1', userId: '42', operation: 'createTrial' });
    scoped.info('Trial created', { expireAt: 1700259200 });

    expect(consoleLogSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [INFO] [PanelApiClient] Trial created {"traceId":"trace-1","userId":"42","operation":"createTrial","expireAt":1700259200}'
    );
  });

  it('leaves the original logger without context', () => {
    logger.withContext({ traceId: 'trace-1' });
    logger.info('Subscription core ready');

    expect(consoleLogSpy).toHaveBeenCalledWith('[2024-01-01T00:00:00.000Z] [INFO] [PanelApiClient] Subscription core ready');
  });

  it('child loggers keep the context under a new component name', () => {
    logger.withContext({ traceId: 'trace-1' }).child('TokenManager').info('Panel credential obtained');

    expect(consoleLogSpy).toHaveBeenCalledWith(
      '[2024-01-01T00:00:00.000Z] [INFO] [TokenManager] Panel credential obtained {"traceId":"trace-1"}'
    );
  });
});
