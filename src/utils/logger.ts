/**
 * Structured logging infrastructure.
 *
 * Diagnostics go to stderr so that `--json` output on stdout stays parseable.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Destination for formatted log lines. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/** Level and sink, shared between a logger and its children. */
interface LoggerState {
  level: LogLevel;
  sink: LogSink;
}

/**
 * Level-filtered logger shared by the engine and the CLI.
 */
class Logger {
  private prefix = '';

  constructor(private readonly state: LoggerState = { level: 'info', sink: stderrSink }) {}

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  setSink(sink: LogSink): void {
    this.state.sink = sink;
  }

  private get sink(): LogSink {
    return this.state.sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  private emit(color: (text: string) => string, text: string, data?: Record<string, unknown>): void {
    const message = this.prefix ? `[${this.prefix}] ${text}` : text;
    this.sink(color(message));
    if (data) {
      this.sink(color(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.emit(chalk.gray, `[DEBUG] ${message}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.emit(chalk.blue, `[INFO] ${message}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.emit(chalk.yellow, `[WARN] ${message}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.emit(chalk.red, `[ERROR] ${message}`);
    if (error instanceof Error) {
      if (this.shouldLog('debug') && error.stack) {
        this.sink(chalk.red(error.stack));
      }
    } else if (error) {
      this.sink(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success message (shown unless level is above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    this.sink(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    this.sink(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. Level and sink stay shared with the
   * parent.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.state);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
