/**
 * Sensor link logger
 * Category-tagged console logging for link lifecycle events.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LinkLoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

export class LinkLogger {
  private level: LogLevel;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LinkLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  formatMessage(level: LogLevel, category: string, message: string, data?: unknown): string {
    const timestamp = this.now().toISOString();
    let logLine = `[${timestamp}] [${level.toUpperCase()}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  log(level: LogLevel, message: string, data?: unknown, category: string = 'LINK'): void {
    if (!this.isEnabled(level)) return;
    this.write(this.formatMessage(level, category, message, data));
  }

  debug(message: string, data?: unknown, category: string = 'LINK'): void {
    this.log('debug', message, data, category);
  }

  info(message: string, data?: unknown, category: string = 'LINK'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'LINK'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'LINK'): void {
    this.log('error', message, data, category);
  }

  // Transport-level logging
  logTransportEvent(eventName: string, details?: unknown): void {
    this.debug(`Transport event: ${eventName}`, details, 'TRANSPORT');
  }

  logConnection(address: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${address}`, details, 'CONNECTION');
  }

  logConnectionError(address: string, phase: string, error: unknown): void {
    this.error(
      `${phase} FAILED - ${address}`,
      { error: error instanceof Error ? error.message : String(error) },
      'CONNECTION'
    );
  }
}

export const linkLogger = new LinkLogger();
