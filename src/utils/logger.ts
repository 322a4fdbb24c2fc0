// Console-backed logging used across the library.
// Components take a Logger so tests can capture or silence output.

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export const consoleLogger: Logger = {
  debug: (message, ...details) => console.debug(message, ...details),
  info: (message, ...details) => console.log(message, ...details),
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface LogEntry {
  level: keyof Logger;
  message: string;
  details: unknown[];
}

/** Logger that records entries in memory. */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, ...details: unknown[]): void {
    this.entries.push({ level: "debug", message, details });
  }

  info(message: string, ...details: unknown[]): void {
    this.entries.push({ level: "info", message, details });
  }

  warn(message: string, ...details: unknown[]): void {
    this.entries.push({ level: "warn", message, details });
  }

  error(message: string, ...details: unknown[]): void {
    this.entries.push({ level: "error", message, details });
  }

  messages(level: keyof Logger): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}
