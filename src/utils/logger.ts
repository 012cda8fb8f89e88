import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_LABELS: Record<LogLevel, string> = {
  error: chalk.red('error'),
  warn: chalk.yellow('warn'),
  info: chalk.cyan('info'),
  debug: chalk.magenta('debug'),
  trace: chalk.gray('trace'),
};

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Levelled console logger. Everything goes to stderr so the compose tool
 * keeps stdout to itself.
 */
export class ConsoleLogger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string): void {
    if (this.shouldLog(level)) {
      console.error(`${LEVEL_LABELS[level]} ${message}`);
    }
  }

  error(message: string): void {
    this.write('error', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  trace(message: string): void {
    this.write('trace', message);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Map -v / -q flags to a level. Each -v raises verbosity by one step above
 * the default.
 */
export const levelFromVerbosity = ({
  verbose,
  quiet,
  defaultLevel = 'info',
}: {
  verbose: number;
  quiet: boolean;
  defaultLevel?: LogLevel;
}): LogLevel => {
  if (quiet) return 'warn';

  const index = Math.min(
    LOG_LEVELS.indexOf(defaultLevel) + verbose,
    LOG_LEVELS.length - 1
  );
  return LOG_LEVELS[index] ?? defaultLevel;
};

const envLevel = process.env.STACKS_LOG_LEVEL;

export const logger = new ConsoleLogger(isLogLevel(envLevel) ? envLevel : 'info');
