/**
 * Leveled console logging for the CLI and the generation run.
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

/** Where log lines go; the console by default. */
export interface LogOutput {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const consoleOutput: LogOutput = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

type Channel = keyof LogOutput;

class Logger {
  private level: LogLevel = 'info';
  private prefix = '';

  constructor(private output: LogOutput = consoleOutput) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  /** Redirect output, e.g. to capture it. Pass nothing to restore the console. */
  setOutput(output: LogOutput = consoleOutput): void {
    this.output = output;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', 'log', chalk.gray, `[DEBUG] ${this.format(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', 'log', chalk.blue, `[INFO] ${this.format(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', 'warn', chalk.yellow, `[WARN] ${this.format(message)}`, data);
  }

  /** Errors print their stack; other details print as JSON. */
  error(message: string, error?: Error | Record<string, unknown>): void {
    const detail = error instanceof Error ? error.stack ?? error.message : error;
    this.emit('error', 'error', chalk.red, `[ERROR] ${this.format(message)}`, detail);
  }

  success(message: string): void {
    this.emit('info', 'log', chalk.green, `✓ ${message}`);
  }

  fail(message: string): void {
    this.emit('info', 'log', chalk.red, `✗ ${message}`);
  }

  /**
   * Logger sharing this one's level and output, with `prefix` appended to
   * the current prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.output);
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    channel: Channel,
    paint: (text: string) => string,
    line: string,
    detail?: string | Record<string, unknown>
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    this.output[channel](paint(line));
    if (detail !== undefined) {
      this.output[channel](paint(typeof detail === 'string' ? detail : JSON.stringify(detail, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
