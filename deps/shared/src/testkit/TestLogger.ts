import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, loggerLevelSchema } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: loggerLevelSchema("silent"),
  })
);

/**
 * 測試用 logger，預設不輸出；除錯時設定 TEST_LOG_LEVEL=debug。
 */
export function buildTestLogger() {
  return new LoggerConsole(getTestLoggerConfig().TEST_LOG_LEVEL);
}
