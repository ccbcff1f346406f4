/**
 * Sink for the SDK's own diagnostics (delivery failures, overflow, shutdown).
 * Messages are prefixed with the error code, e.g. `[TF-2000] ...`.
 */
export interface DiagnosticLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const consoleLogger: DiagnosticLogger = console;
