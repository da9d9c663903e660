/**
 * Leveled console logger shared by the CLI and the engine.
 *
 * Progress and diagnostics go through here; command results are printed by
 * the formatters. Warnings and errors always go to stderr. Debug, info and
 * success lines go to stdout unless the stream is switched to stderr, which
 * the validate command does when stdout carries a JSON document.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Where debug, info and success lines are written. */
export type LogStream = 'stdout' | 'stderr';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type LineKind = 'debug' | 'info' | 'success' | 'warn' | 'error';

interface LineStyle {
  level: Exclude<LogLevel, 'silent'>;
  tag: string;
  colour: (text: string) => string;
  sink: 'progress' | 'warning' | 'error';
}

const LINE_STYLES: Record<LineKind, LineStyle> = {
  debug: { level: 'debug', tag: '[DEBUG]', colour: chalk.gray, sink: 'progress' },
  info: { level: 'info', tag: '[INFO]', colour: chalk.blue, sink: 'progress' },
  success: { level: 'info', tag: '✓', colour: chalk.green, sink: 'progress' },
  warn: { level: 'warn', tag: '[WARN]', colour: chalk.yellow, sink: 'warning' },
  error: { level: 'error', tag: '[ERROR]', colour: chalk.red, sink: 'error' },
};

/** Settings shared between a logger and every child made from it. */
interface LoggerSettings {
  level: LogLevel;
  stream: LogStream;
}

function formatData(data: Record<string, unknown> | undefined): string | undefined {
  return data === undefined ? undefined : JSON.stringify(data, null, 2);
}

class Logger {
  constructor(
    private readonly settings: LoggerSettings = { level: 'info', stream: 'stdout' },
    private readonly prefix: string = ''
  ) {}

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setStream(stream: LogStream): void {
    this.settings.stream = stream;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, formatData(data));
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, formatData(data));
  }

  /** Completion notice, shown at info level. */
  success(message: string): void {
    this.write('success', message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, formatData(data));
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    const detail = error instanceof Error ? error.stack || error.message : formatData(error);
    this.write('error', message, detail);
  }

  /**
   * Logger whose lines carry `[prefix]`. It follows later level and stream
   * changes made on this logger.
   */
  child(prefix: string): Logger {
    return new Logger(this.settings, this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }

  private write(kind: LineKind, message: string, detail?: string): void {
    const style = LINE_STYLES[kind];
    if (LOG_LEVELS[style.level] < LOG_LEVELS[this.settings.level]) return;

    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    this.print(style.sink, style.colour(`${style.tag} ${text}`));
    if (detail !== undefined) {
      this.print(style.sink, style.colour(detail));
    }
  }

  private print(sink: LineStyle['sink'], line: string): void {
    if (sink === 'warning') {
      console.warn(line);
    } else if (sink === 'error' || this.settings.stream === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger();

export { Logger };
