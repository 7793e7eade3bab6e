/**
 * Logger used by the runner, executors and CLI.
 *
 * The engine never writes to the console directly; everything goes through
 * one of these so tests and `validate` can run quietly.
 */
export interface Logger {
  /** Progress lines */
  log(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  /** Verbose output. Optional to implement. */
  debug?(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  info(message: string): void {
    console.info(message);
  }

  debug(message: string): void {
    if (process.env.DEBUG || process.env.VERBOSE) {
      console.debug(message);
    }
  }
}

export class SilentLogger implements Logger {
  log(_message: string): void {}
  error(_message: string): void {}
  warn(_message: string): void {}
  info(_message: string): void {}
  debug(_message: string): void {}
}

export type LogLevel = 'log' | 'error' | 'warn' | 'info' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Keeps every line in memory. Handy for asserting on runner output.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
