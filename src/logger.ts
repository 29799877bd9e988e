import pino from "pino";

export type LoggerOptions = {
  readonly level?: string;
  readonly file?: string;
  /** Called when the log file cannot be written. Defaults to a line on stderr. */
  readonly onSinkError?: (err: Error) => void;
};

const reportSinkError = (err: Error) => {
  process.stderr.write(`news-ingest: log file write failed: ${err.message}\n`);
};

/**
 * Creates a configured pino logger instance for structured JSON line output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps
 * - Level configurable via `LOG_LEVEL` env var, defaults to `info`
 * - Appends to the file named by `options.file` or `LOG_FILE` when set, stdout otherwise
 *
 * File writes are buffered and flushed off the caller's stack; a failing log
 * file is reported through `onSinkError` and never surfaces in the code that logged.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const file = options.file ?? process.env["LOG_FILE"];

  const loggerOptions: pino.LoggerOptions = {
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!file) {
    return pino(loggerOptions);
  }

  const destination = pino.destination({ dest: file, append: true, mkdir: true });
  destination.on("error", options.onSinkError ?? reportSinkError);

  return pino(loggerOptions, destination);
}
