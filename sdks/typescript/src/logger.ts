import pino, { type LevelWithSilent, type Logger } from "pino";

export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Creates the pino logger the client writes request diagnostics to.
 *
 * Silent unless a level is given, so embedding applications opt in. The
 * credential never reaches the output: `apiKey` and any `x-key` header are
 * redacted wherever they appear in a log object.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "gie-client",
    level: options.level ?? "silent",
    redact: {
      paths: ["apiKey", 'headers["x-key"]', '*.headers["x-key"]'],
      censor: "[redacted]",
    },
  });
}
