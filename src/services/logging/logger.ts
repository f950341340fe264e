export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;

  constructor(options?: ConsoleLoggerOptions) {
    this.level = options?.level ?? 'info';
    this.scope = options?.scope;
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.format(message), ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...details);
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    const timestamp = new Date().toISOString();
    return this.scope ? `[${timestamp}] [${this.scope}] ${message}` : `[${timestamp}] ${message}`;
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
