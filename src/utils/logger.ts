/**
 * Leveled logging for the sexpfmt CLI.
 *
 * Everything goes to stderr: stdout is reserved for formatted source when
 * reading from stdin.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const STYLES: Record<MessageLevel, { label: string; paint: ChalkInstance; write: (line: string) => void }> = {
  debug: { label: 'DEBUG', paint: chalk.gray, write: (line) => console.error(line) },
  info: { label: 'INFO', paint: chalk.blue, write: (line) => console.error(line) },
  warn: { label: 'WARN', paint: chalk.yellow, write: (line) => console.warn(line) },
  error: { label: 'ERROR', paint: chalk.red, write: (line) => console.error(line) },
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    this.emit('error', message, error instanceof Error ? error.stack || error.message : error);
  }

  /** One labelled line, then the detail block if there is one. */
  private emit(level: MessageLevel, message: string, detail?: string | Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const { label, paint, write } = STYLES[level];
    write(paint(`[${label}] ${message}`));
    if (detail !== undefined) {
      write(paint(typeof detail === 'string' ? detail : JSON.stringify(detail, null, 2)));
    }
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
