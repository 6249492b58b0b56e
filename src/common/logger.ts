import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];
export const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

type LogMetadata = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

export interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  destination: Writable;
}

/**
 * Leveled logger writing text or JSON lines. Children add a scope and share their parent's
 * level, format and destination, so `configure` on any of them applies to the whole family.
 */
export class Logger {
  private readonly settings: LoggerSettings;
  private scope?: string;

  constructor(options: LoggerOptions = {}, shared?: LoggerSettings) {
    this.settings = shared ?? {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      destination: options.destination ?? process.stderr,
    };
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.settings);
  }

  configure(options: LoggerOptions): void {
    this.settings.level = options.level ?? this.settings.level;
    this.settings.format = options.format ?? this.settings.format;
    this.settings.destination = options.destination ?? this.settings.destination;
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return SEVERITY[level] >= SEVERITY[this.settings.level];
  }

  debug(message: string, metadata: LogMetadata = {}): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata: LogMetadata = {}): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata: LogMetadata = {}): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, metadata: LogMetadata = {}): void {
    this.emit('error', message, metadata);
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, metadata: LogMetadata): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const time = new Date().toISOString();
    if (this.settings.format === 'json') {
      this.settings.destination.write(`${JSON.stringify({ level, time, message, scope: this.scope, ...metadata })}\n`);
      return;
    }

    const scope = this.scope ? `[${this.scope}] ` : '';
    const extra = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    this.settings.destination.write(`${time} ${level.toUpperCase()} ${scope}${message}${extra}\n`);
  }
}

const rootLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? rootLogger.child(scope) : rootLogger;
}

export function configureLogger(options: LoggerOptions): void {
  rootLogger.configure(options);
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
  }
  return level;
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const format = LOG_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new Error(`Unsupported log format "${value}". Use text or json.`);
  }
  return format;
}
