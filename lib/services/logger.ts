/**
 * Logger interface used across the client
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  error(message: string, ...args: unknown[]): void {
    // biome-ignore lint/suspicious/noConsole: logger sink
    console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    // biome-ignore lint/suspicious/noConsole: logger sink
    console.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    // biome-ignore lint/suspicious/noConsole: logger sink
    console.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    // biome-ignore lint/suspicious/noConsole: logger sink
    console.debug(message, ...args);
  }
}

/**
 * Logger that discards everything. Used when no logger is configured.
 */
export class NoopLogger implements Logger {
  error(): void {}
  warn(): void {}
  info(): void {}
  debug(): void {}
}

/**
 * Get the default logger
 * @returns Silent logger instance
 */
export function getDefaultLogger(): Logger {
  return new NoopLogger();
}
