export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export class Logger {
  constructor(
    private prefix: string,
    private context: LogContext = {},
  ) {}

  /** Same prefix, extra context merged into every line (e.g. a run id). */
  child(context: LogContext): Logger {
    return new Logger(this.prefix, { ...this.context, ...context });
  }

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext) {
    const errorContext = error
      ? {
          error: error.message,
          code: "code" in error ? error.code : undefined,
          ...context,
        }
      : context;
    this.log("error", message, errorContext);
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    const fullContext = { ...this.context, ...context };
    const contextStr =
      Object.keys(fullContext).length > 0
        ? ` ${JSON.stringify(fullContext)}`
        : "";

    const formattedMessage = `[${this.prefix}] ${message}${contextStr}`;

    switch (level) {
      case "debug":
        console.debug(formattedMessage);
        break;
      case "info":
        console.log(formattedMessage);
        break;
      case "warn":
        console.warn(formattedMessage);
        break;
      case "error":
        console.error(formattedMessage);
        break;
    }
  }
}

export function createLogger(prefix: string, context?: LogContext): Logger {
  return new Logger(prefix, context);
}

export const loggers = {
  sheets: createLogger("Sheets"),
  extractor: createLogger("Extractor"),
  renderer: createLogger("Renderer"),
  converter: createLogger("Converter"),
  batch: createLogger("Batch"),
  reconciler: createLogger("Reconciler"),
  dispatch: createLogger("Dispatch"),
  mail: createLogger("Mail"),
  cli: createLogger("CLI"),
};
