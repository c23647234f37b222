import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";

const schema = t.Object({
  LOG_LEVEL: t.Union([t.Literal("info"), t.Literal("debug")], {
    default: "info",
  }),
  FEATURE_ON: t.Optional(envBoolean()),
  RETRY: t.Optional(t.Integer()),
});

describe("buildConfigFactoryEnv", () => {
  test("套用預設值並轉換型別", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      FEATURE_ON: "true",
      RETRY: "3",
      UNRELATED: "x",
    });
    expect(getConfig()).toEqual({
      LOG_LEVEL: "info",
      FEATURE_ON: true,
      RETRY: 3,
    });
  });

  test("空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      LOG_LEVEL: "",
      RETRY: "",
    });
    expect(getConfig()).toEqual({ LOG_LEVEL: "info" });
  });

  test("不符合 schema 時拋出錯誤", () => {
    const getConfig = buildConfigFactoryEnv(schema, { LOG_LEVEL: "loud" });
    expect(() => getConfig()).toThrow();
  });
});
