import type { AsyncDisposableResource } from "~shared/utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

/** `silent` 只用於設定，不會出現在紀錄上 */
export type LoggerLevel = LogLevel | "silent";

/**
 * 每筆紀錄附帶的上下文。
 * - event：事件名稱，會顯示在路徑後方並用來查 emoji
 * - emoji：覆寫本次輸出的 emoji
 * - error：錯誤物件，console 會印出 stack，transport 會序列化
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

/**
 * 可用兩種方式呼叫：
 * - `logger.info({ count }, "訊息")` 或 `logger.info("訊息")`
 * - `logger.info({ count })\`訊息 ${value}\``，插值會以顏色標示並記錄為 `__0`、`__1`…
 */
export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export type LogRecordError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: LogRecordError;
};

export interface LogTransport extends AsyncDisposableResource {
  write(record: LogRecord): void;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，名稱接在路徑後方，context 會合併到之後的每筆紀錄 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}
