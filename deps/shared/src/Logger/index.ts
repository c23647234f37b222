import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import type { LoggerLevel } from "./Logger";
import { LoggerConsole, defaultEmojiMap } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, defaultEmojiMap, type EmojiMap } from "./LoggerConsole";

export function loggerLevelSchema(defaultLevel: LoggerLevel) {
  return t.Union(
    [
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
      t.Literal("silent"),
    ],
    { default: defaultLevel }
  );
}

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: loggerLevelSchema("info"),
    /** 設定後會額外把紀錄寫入此目錄 */
    LOG_FILE_DIR: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE_DIR) {
    logger.attachTransport(
      new RfsTransport({
        filename: "organizer.log",
        rfs: { path: LOG_FILE_DIR },
      })
    );
  }
  return logger;
}
