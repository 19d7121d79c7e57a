export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const logLevels: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
];

/**
 * 日誌上下文。`event`、`emoji`、`error` 為保留欄位，其餘原樣輸出。
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogFn {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export interface Logger {
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  /** 增加一層路徑（以 `:` 串接）並合併上下文 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併上下文，不改變路徑 */
  append(context: LogContext): Logger;
}
