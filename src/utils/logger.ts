/**
 * Levelled console logging for the engine and the CLI.
 *
 * One root `logger` holds the level; `logger.child('transform')` tags lines
 * with a component name and always follows the root's level, so `--quiet`
 * and `--verbose` reach every module.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Emitting = Exclude<LogLevel, 'silent'>;

const STYLES: Record<Emitting, { tag: string; paint: (text: string) => string }> = {
  debug: { tag: 'DEBUG', paint: (text) => chalk.gray(text) },
  info: { tag: 'INFO', paint: (text) => chalk.blue(text) },
  warn: { tag: 'WARN', paint: (text) => chalk.yellow(text) },
  error: { tag: 'ERROR', paint: (text) => chalk.red(text) },
};

class Logger {
  private level: LogLevel = 'info';

  constructor(
    private readonly component: string = '',
    private readonly root?: Logger
  ) {}

  setLevel(level: LogLevel): void {
    if (this.root) {
      this.root.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.level;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  /** Written to stderr. */
  warn(message: string): void {
    this.write('warn', message);
  }

  /** Written to stderr. */
  error(message: string): void {
    this.write('error', message);
  }

  child(component: string): Logger {
    const name = this.component ? `${this.component}:${component}` : component;
    return new Logger(name, this.root ?? this);
  }

  private write(level: Emitting, message: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) return;

    const { tag, paint } = STYLES[level];
    const line = paint(`[${tag}] ${this.component ? `[${this.component}] ` : ''}${message}`);
    if (level === 'warn') {
      console.warn(line);
    } else if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger();

export { Logger };
