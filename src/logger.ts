/**
 * Line-oriented console logger passed explicitly to every pipeline stage.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const now = (): string => new Date().toISOString();

/**
 * Create a logger writing `[timestamp] LEVEL message` lines to the console.
 *
 * @param clock - Timestamp source, replaceable in tests
 */
export function createLogger(clock: () => string = now): Logger {
  return {
    info: (message) => console.log(`[${clock()}] INFO ${message}`),
    warn: (message) => console.warn(`[${clock()}] WARN ${message}`),
    error: (message) => console.error(`[${clock()}] ERROR ${message}`),
  };
}

/**
 * Render a caught value as a log-friendly message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
