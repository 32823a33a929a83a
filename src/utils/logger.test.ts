import { IDebugConfig, LogLevel } from '../config/debug';
import { Logger, formatJson, formatPretty } from './logger';

describe('Logger', () => {
  const quiet: IDebugConfig = {
    enabled: false,
    logDispatch: false,
    logFields: false,
    logLevel: LogLevel.WARN,
    logFormat: 'pretty'
  };

  const verbose: IDebugConfig = {
    enabled: true,
    logDispatch: true,
    logFields: false,
    logLevel: LogLevel.DEBUG,
    logFormat: 'json'
  };

  it('should drop entries below the configured level', () => {
    const write = jest.fn();
    const logger = new Logger(quiet, write);

    logger.debug('dispatch', 'dispatching');
    logger.info('starting');
    logger.warn('careful');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0][0]).toMatch(/ \[WARN\] \[docfilter\] careful$/);
  });

  it('should only write debug entries for enabled categories', () => {
    const write = jest.fn();
    const logger = new Logger(verbose, write);

    logger.debug('fields', 'resolving');
    logger.debug('dispatch', 'dispatching', { shape: 'containsKey' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(write.mock.calls[0][0])).toMatchObject({
      level: 'debug',
      category: 'dispatch',
      message: 'dispatching',
      shape: 'containsKey'
    });
  });

  it('should report which debug categories are written', () => {
    expect(new Logger(verbose, jest.fn()).isDebugEnabled('dispatch')).toBe(true);
    expect(new Logger(verbose, jest.fn()).isDebugEnabled('fields')).toBe(false);
    expect(new Logger(quiet, jest.fn()).isDebugEnabled('dispatch')).toBe(false);
  });

  it('should record errors and other payloads', () => {
    const write = jest.fn();
    const logger = new Logger(verbose, write);

    logger.error('failed', new Error('boom'));
    logger.info('values', [1, 2]);

    expect(JSON.parse(write.mock.calls[0][0])).toMatchObject({
      level: 'error',
      error: { name: 'Error', message: 'boom' }
    });
    expect(JSON.parse(write.mock.calls[1][0])).toMatchObject({ level: 'info', data: [1, 2] });
  });
});

describe('formatPretty', () => {
  it('should format an entry as one line', () => {
    expect(formatPretty({ timestamp: 'T', level: LogLevel.INFO, message: 'hi' })).toBe(
      'T [INFO] [docfilter] hi'
    );
  });

  it('should append the payload', () => {
    const line = formatPretty({
      timestamp: 'T',
      level: LogLevel.DEBUG,
      category: 'dispatch',
      message: 'm',
      shape: 'containsKey'
    });

    expect(line).toBe('T [DEBUG] [docfilter:dispatch] m\n{\n  "shape": "containsKey"\n}');
  });
});

describe('formatJson', () => {
  it('should serialize big integers as text', () => {
    expect(formatJson({ timestamp: 'T', level: LogLevel.WARN, message: 'm', data: BigInt(5) })).toBe(
      '{"timestamp":"T","level":"warn","message":"m","data":"5n"}'
    );
  });
});
