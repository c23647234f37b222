import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogRecordError,
  LogTransport,
  Logger,
  LoggerLevel,
  TemplateLog,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const levelOrder: Record<LoggerLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LoggerLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.bind("trace");
    this.debug = this.bind("debug");
    this.info = this.bind("info");
    this.warn = this.bind("warn");
    this.error = this.bind("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由整棵 logger 樹共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private bind(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string, colored: string) =>
      this.write(level, context, message, colored);

    function log(context: LogContext, message: string): void;
    function log(message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        write({}, contextOrMessage, contextOrMessage);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        write(context, message, message);
        return;
      }
      return (strings, ...values) => {
        let plain = strings[0];
        let colored = strings[0];
        const interpolated: Record<string, unknown> = {};
        values.forEach((value, index) => {
          plain += String(value) + strings[index + 1];
          colored += kleur.green(String(value)) + strings[index + 1];
          interpolated[`__${index}`] = value;
        });
        write({ ...context, ...interpolated }, plain, colored);
      };
    }
    return log;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    colored: string
  ) {
    if (levelOrder[level] < levelOrder[this.level]) return;

    const { event, emoji, error, ...rest } = {
      ...this.context,
      ...callContext,
    };
    const label = [...this.path, event ?? level].join(":");
    const icon = this.resolveEmoji(level, callContext);
    const err = serializeError(error);
    const hasContext = Object.keys(rest).length > 0;

    let line = `${icon} ${label}: ${colored}`;
    if (hasContext) line += ` ${kleur.gray(safeStringify(rest))}`;
    if (error !== undefined && !err) line += ` ${safeStringify(error)}`;
    if (err?.stack) line += `\n${err.stack}`;
    else if (err) line += `\n${err.name}: ${err.message}`;

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: message,
      context: rest,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }

  private resolveEmoji(level: LogLevel, callContext: LogContext) {
    if (callContext.emoji) return callContext.emoji;
    if (callContext.event && this.emojiMap[callContext.event])
      return this.emojiMap[callContext.event];
    // warn / error 的 emoji 優先於繼承而來的 emoji
    if (level === "warn" || level === "error") return this.emojiMap[level];
    return this.context.emoji ?? this.emojiMap[level] ?? "";
  }
}

function serializeError(error: unknown): LogRecordError | undefined {
  if (!(error instanceof Error)) return undefined;
  return { name: error.name, message: error.message, stack: error.stack };
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
