export type LogContext = Record<string, unknown>;

/**
 * Minimal logging surface the SDK writes to. Anything with `debug` and `warn`
 * methods fits, including `console` and most structured loggers.
 */
export interface JupiterLogger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

export const silentLogger: JupiterLogger = {
  debug: () => undefined,
  warn: () => undefined
};
