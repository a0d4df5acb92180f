import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

/**
 * Diagnostic logger. Lines go to stderr, tagged `packstead:<level>`, so they
 * never mix with command output on stdout (`packstead list | ...`).
 * User-facing status goes through the OutputPort instead.
 */

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    // JSON.stringify(new Error()) is {}
    return `\n${meta.stack ?? `${meta.name}: ${meta.message}`}`;
  }
  if (meta && typeof meta === 'object') {
    return `\n${JSON.stringify(meta, null, 2)}`;
  }
  if (meta !== undefined && meta !== null && meta !== '') {
    return ` ${String(meta)}`;
  }
  return '';
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = LogLevel.INFO, sink: LogSink = stderrSink) {
    this.level = level;
    this.sink = sink;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) {
      return;
    }
    this.sink(`packstead:${level} ${message}${formatMeta(meta)}`);
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Starting level: debug with PACKSTEAD_VERBOSE=1, info under
 * NODE_ENV=development, otherwise errors only.
 */
export function initialLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'development') return LogLevel.INFO;
  return LogLevel.ERROR;
}

export const logger = new ConsoleLogger(initialLogLevel());
