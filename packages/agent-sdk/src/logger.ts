/**
 * ILogger: structured logger the engine writes through.
 *
 * agent-core ships `createLogger(namespace)` backed by the `debug` package;
 * hosts may pass any object with this shape.
 */

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
}
