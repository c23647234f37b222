import { describe, expect, test } from "vitest";

import { parseInteger } from "@/utils/helper";

describe("parseInteger", () => {
  test("接受整數與整數字串", () => {
    expect(parseInteger(30)).toBe(30);
    expect(parseInteger("7")).toBe(7);
    expect(parseInteger(" 0 ")).toBe(0);
    expect(parseInteger("-3")).toBe(-3);
  });

  test("小數、非數字與空字串回傳 undefined", () => {
    expect(parseInteger(1.5)).toBeUndefined();
    expect(parseInteger("1.5")).toBeUndefined();
    expect(parseInteger("abc")).toBeUndefined();
    expect(parseInteger("3d")).toBeUndefined();
    expect(parseInteger("")).toBeUndefined();
    expect(parseInteger(Number.NaN)).toBeUndefined();
  });
});
