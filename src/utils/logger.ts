import { ILogObj, Logger } from "tslog";

export type LogLevelName =
  | "silly"
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal";

const LOG_LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

// stdout carries the MCP stdio transport, so log lines go to stderr only.
export const logger = new Logger<ILogObj>({
  name: "corpus-qa",
  type: "hidden",
  minLevel: LOG_LEVELS.info,
});

logger.attachTransport((logObj) => {
  process.stderr.write(`${JSON.stringify(logObj)}\n`);
});

export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown error";
}
