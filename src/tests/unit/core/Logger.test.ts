import { Logger } from '../../../services/core/Logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;

  beforeEach(() => {
    logger = new Logger('FeatureStore');
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('info', () => {
    it('should log info messages with structured format', () => {
      logger.info('Feature group reached terminal status', { featureGroupName: 'orders', polls: 3 });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const callArg: string = consoleLogSpy.mock.calls[0][0];
      expect(callArg).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[FeatureStore\] Feature group reached terminal status \{"featureGroupName":"orders","polls":3\}$/
      );
    });

    it('should omit metadata when there is none', () => {
      logger.info('Simple message');

      const callArg: string = consoleLogSpy.mock.calls[0][0];
      expect(callArg.endsWith('[INFO] [FeatureStore] Simple message')).toBe(true);
    });
  });

  describe('error', () => {
    it('should log error messages to stderr', () => {
      logger.error('Offline store cleanup failed', { error: 'AccessDenied' });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const callArg: string = consoleErrorSpy.mock.calls[0][0];
      expect(callArg).toContain('[ERROR] [FeatureStore] Offline store cleanup failed {"error":"AccessDenied"}');
    });
  });

  describe('warn', () => {
    it('should log warning messages', () => {
      logger.warn('Query failed', { executionId: 'exec-1' });

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      const callArg: string = consoleWarnSpy.mock.calls[0][0];
      expect(callArg).toContain('[WARN] [FeatureStore] Query failed {"executionId":"exec-1"}');
    });
  });

  describe('debug', () => {
    const originalLogLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (originalLogLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = originalLogLevel;
      }
    });

    it('should log debug messages when LOG_LEVEL=debug', () => {
      process.env.LOG_LEVEL = 'debug';

      logger.debug('Feature group status', { status: 'Creating' });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('[DEBUG] [FeatureStore] Feature group status {"status":"Creating"}');
    });

    it('should not log debug messages otherwise', () => {
      process.env.LOG_LEVEL = 'info';

      logger.debug('Feature group status', { status: 'Creating' });

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('context', () => {
    it('should merge bound context from child loggers ahead of call metadata', () => {
      const child = logger.child({ featureGroupName: 'orders' });

      child.info('Polling', { polls: 1 });

      expect(consoleLogSpy.mock.calls[0][0]).toContain('[FeatureStore] Polling {"featureGroupName":"orders","polls":1}');
    });

    it('should let call metadata override bound context', () => {
      const child = logger.child({ namespace: 'experiment_1' });

      child.warn('Namespace missing', { namespace: 'experiment_2' });

      expect(consoleWarnSpy.mock.calls[0][0]).toContain('Namespace missing {"namespace":"experiment_2"}');
    });

    it('should stack context across nested children', () => {
      const child = logger.child({ featureGroupName: 'orders' }).child({ executionId: 'exec-1' });

      child.info('Query succeeded');

      expect(consoleLogSpy.mock.calls[0][0]).toContain(
        'Query succeeded {"featureGroupName":"orders","executionId":"exec-1"}'
      );
    });
  });
});
