/**
 * @file log.ts
 * @description Leveled message log and the sinks its lines go to.
 */

export enum LogLevel {
  Silent = 0,
  Error = 1,
  Warning = 2,
  Info = 3,
  Trace = 4,
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  [LogLevel.Silent]: '',
  [LogLevel.Error]: 'error',
  [LogLevel.Warning]: 'warning',
  [LogLevel.Info]: 'info',
  [LogLevel.Trace]: 'trace',
};

/**
 * Parse a level name as accepted by the `loglevel` option.
 * @returns the level, or undefined if the name is not recognized
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toLowerCase()) {
    case 'silent': return LogLevel.Silent;
    case 'error': return LogLevel.Error;
    case 'warning': return LogLevel.Warning;
    case 'info': return LogLevel.Info;
    case 'trace': return LogLevel.Trace;
    default: return undefined;
  }
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** Destination for formatted log lines, given without their line ending */
export interface LogSink {
  writeLine(line: string): void;
}

/**
 * Keeps every line in memory.
 */
export class MemoryLogSink implements LogSink {
  private lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }

  getLines(): string[] { return [...this.lines]; }

  /** All lines, each ending in a newline */
  toString(): string {
    return this.lines.map((line) => line + '\n').join('');
  }

  clear(): void {
    this.lines.length = 0;
  }
}

/** Writes to process stderr, leaving stdout to the host */
export class StderrLogSink implements LogSink {
  writeLine(line: string): void {
    process.stderr.write(line + '\n');
  }
}

// ---------------------------------------------------------------------------
// MessageLog
// ---------------------------------------------------------------------------

/**
 * Writes one line per message, `<level>: <message>`, for every message at or
 * below the current threshold. The threshold is read through a callback so the
 * owner's configuration can change it after the log is created.
 */
export class MessageLog {
  private sink: LogSink;
  private threshold: () => LogLevel;

  constructor(sink: LogSink, threshold: LogLevel | (() => LogLevel)) {
    this.sink = sink;
    this.threshold = typeof threshold === 'function' ? threshold : () => threshold;
  }

  getSink(): LogSink { return this.sink; }

  getLevel(): LogLevel { return this.threshold(); }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.Silent && level <= this.threshold();
  }

  printMessage(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    this.sink.writeLine(`${LEVEL_TAGS[level]}: ${message}`);
  }

  error(message: string): void { this.printMessage(LogLevel.Error, message); }
  warn(message: string): void { this.printMessage(LogLevel.Warning, message); }
  info(message: string): void { this.printMessage(LogLevel.Info, message); }
  trace(message: string): void { this.printMessage(LogLevel.Trace, message); }
}
