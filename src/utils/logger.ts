import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Logger interface for engine observability */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Console logger with a tag prefix and a level threshold. Writes to stderr so command output stays clean. */
export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(
    tag?: string,
    private readonly level: LogLevel = 'info',
  ) {
    this.prefix = tag ? `[nix-engine:${tag}]` : '[nix-engine]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  /** Child logger sharing this logger's threshold */
  child(tag: string): ConsoleLogger {
    return new ConsoleLogger(tag, this.level);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    console.error(this.format(level, message, data));
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${LEVEL_COLORS[level](level.toUpperCase().padEnd(5))} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
