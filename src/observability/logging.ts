/**
 * Leveled logging for the client and its transport.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';
export type LogContext = Record<string, unknown>;

/** Receives each formatted line; defaults to `console.log`. */
export type LogSink = (line: string) => void;

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  timestamps: boolean;
  /** Prefix naming the emitter, omitted when undefined */
  target?: string;
  sink: LogSink;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    timestamps: true,
    target: 'infoblox',
    sink: (line) => console.log(line),
  };
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
}

/**
 * Renders one log line.
 *
 * `pretty` puts context as `key=value` pairs after the message, `compact` appends it as JSON
 * and `json` merges it into a single object.
 */
export function formatLogLine(
  config: Pick<LoggingConfig, 'format' | 'target'>,
  level: LogLevel,
  message: string,
  context: LogContext | undefined,
  timestamp?: string
): string {
  switch (config.format) {
    case 'json':
      return JSON.stringify({ timestamp, level, target: config.target, message, ...context });
    case 'compact':
      return `[${level.toUpperCase()}] ${message}${context ? ` ${JSON.stringify(context)}` : ''}`;
    case 'pretty': {
      const head = [
        timestamp && `[${timestamp}]`,
        `[${level.toUpperCase()}]`,
        config.target && `${config.target}:`,
        message,
      ].filter((part): part is string => Boolean(part));
      const pairs = Object.entries(context ?? {}).map(
        ([key, value]) => `${key}=${JSON.stringify(value)}`
      );
      return [...head, ...pairs].join(' ');
    }
  }
}

export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config: Partial<LoggingConfig> = {}) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!isLevelEnabled(level, this.config.level)) {
      return;
    }
    const timestamp = this.config.timestamps ? new Date().toISOString() : undefined;
    this.config.sink(formatLogLine(this.config, level, message, context, timestamp));
  }
}

/** Drops everything. */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}
