import { IDebugConfig, LogLevel, loadDebugConfig } from '../config/debug';

export type DebugCategory = 'dispatch' | 'fields';

/**
 * Logging contract accepted by translators
 */
export interface ILogger {
  debug(category: DebugCategory, message: string, payload?: unknown): void;
  /**
   * Whether debug entries of a category would be written, for payloads that
   * are costly to build
   */
  isDebugEnabled(category: DebugCategory): boolean;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
}

export interface ILogEntry {
  timestamp: string;
  level: LogLevel;
  category?: DebugCategory;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const replaceErrors = (_key: string, val: unknown): unknown => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  if (typeof val === 'bigint') {
    return `${val}n`;
  }
  return val;
};

function serialize(value: unknown, indent?: number): string {
  try {
    return JSON.stringify(value, replaceErrors, indent);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
}

/**
 * Format an entry as one human readable line, followed by any payload
 */
export function formatPretty(entry: ILogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[docfilter:${category}]` : '[docfilter]';
  const base = `${timestamp} [${level.toUpperCase()}] ${categoryStr} ${message}`;

  return Object.keys(rest).length > 0 ? `${base}\n${serialize(rest, 2)}` : base;
}

export function formatJson(entry: ILogEntry): string {
  return serialize(entry);
}

/**
 * Writes structured log entries to stderr, gated by the debug configuration
 */
export class Logger implements ILogger {
  constructor(
    private readonly config: IDebugConfig = loadDebugConfig(),
    private readonly write: (line: string) => void = line => console.error(line)
  ) {}

  public debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!this.isDebugEnabled(category)) {
      return;
    }
    this.emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  public isDebugEnabled(category: DebugCategory): boolean {
    return this.categoryEnabled(category) && this.shouldLog(LogLevel.DEBUG);
  }

  public info(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
    }
  }

  public warn(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
    }
  }

  public error(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
    }
  }

  private categoryEnabled(category: DebugCategory): boolean {
    if (!this.config.enabled) {
      return false;
    }
    switch (category) {
      case 'dispatch':
        return this.config.logDispatch;
      case 'fields':
        return this.config.logFields;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.logLevel];
  }

  private createEntry(
    level: LogLevel,
    category: DebugCategory | undefined,
    message: string,
    payload?: unknown
  ): ILogEntry {
    const entry: ILogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    };

    if (category) {
      entry.category = category;
    }

    if (payload instanceof Error) {
      entry.error = { name: payload.name, message: payload.message, stack: payload.stack };
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      Object.assign(entry, payload);
    } else if (payload !== undefined) {
      entry.data = payload;
    }

    return entry;
  }

  private emit(entry: ILogEntry): void {
    this.write(this.config.logFormat === 'json' ? formatJson(entry) : formatPretty(entry));
  }
}

/**
 * Logger configured from the environment at load time
 */
export const logger: ILogger = new Logger();
