export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export type LogFormat = 'json' | 'pretty';

export interface IDebugConfig {
  enabled: boolean;
  logDispatch: boolean;
  logFields: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toBool = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'json' ? 'json' : defaultValue;
};

/**
 * Read the debug logging configuration from the environment
 *
 * - `DOCFILTER_DEBUG`: enables debug categories (default false)
 * - `DOCFILTER_DEBUG_DISPATCH`, `DOCFILTER_DEBUG_FIELDS`: per category, default true once enabled
 * - `DOCFILTER_LOG_LEVEL`: debug | info | warn | error (default warn)
 * - `DOCFILTER_LOG_FORMAT`: pretty | json (default pretty)
 */
export function loadDebugConfig(env: NodeJS.ProcessEnv = process.env): IDebugConfig {
  const enabled = toBool(env.DOCFILTER_DEBUG, false);
  const logLevel = toLogLevel(env.DOCFILTER_LOG_LEVEL, enabled ? LogLevel.DEBUG : LogLevel.WARN);
  const logFormat = toLogFormat(env.DOCFILTER_LOG_FORMAT, 'pretty');

  if (!enabled) {
    return {
      enabled: false,
      logDispatch: false,
      logFields: false,
      logLevel,
      logFormat
    };
  }

  return {
    enabled: true,
    logDispatch: toBool(env.DOCFILTER_DEBUG_DISPATCH, true),
    logFields: toBool(env.DOCFILTER_DEBUG_FIELDS, true),
    logLevel,
    logFormat
  };
}
