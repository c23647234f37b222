import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { ContentComparatorMd5 } from "@/services/ContentComparator";

const tmpDir = "test/tmp/comparator";

describe("ContentComparatorMd5", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, "a.bin"), "same content");
    await writeFile(join(tmpDir, "b.bin"), "same content");
    await writeFile(join(tmpDir, "c.bin"), "diff content");
    await writeFile(join(tmpDir, "d.bin"), "longer content here");
    await writeFile(join(tmpDir, "empty1.bin"), "");
    await writeFile(join(tmpDir, "empty2.bin"), "");
  });

  test("內容相同回傳 true", async () => {
    const comparator = new ContentComparatorMd5();
    const result = await comparator.isSameContent(
      join(tmpDir, "a.bin"),
      join(tmpDir, "b.bin")
    );
    expectOk(result);
    expect(result.value).toBe(true);
  });

  test("大小相同但內容不同回傳 false", async () => {
    const comparator = new ContentComparatorMd5();
    const result = await comparator.isSameContent(
      join(tmpDir, "a.bin"),
      join(tmpDir, "c.bin")
    );
    expectOk(result);
    expect(result.value).toBe(false);
  });

  test("大小不同回傳 false", async () => {
    const comparator = new ContentComparatorMd5();
    const result = await comparator.isSameContent(
      join(tmpDir, "a.bin"),
      join(tmpDir, "d.bin")
    );
    expectOk(result);
    expect(result.value).toBe(false);
  });

  test("空檔案視為相同", async () => {
    const comparator = new ContentComparatorMd5();
    const result = await comparator.isSameContent(
      join(tmpDir, "empty1.bin"),
      join(tmpDir, "empty2.bin")
    );
    expectOk(result);
    expect(result.value).toBe(true);
  });

  test("讀不到檔案時回傳錯誤", async () => {
    const comparator = new ContentComparatorMd5();
    const missing = join(tmpDir, "missing.bin");
    const result = await comparator.isSameContent(
      join(tmpDir, "a.bin"),
      missing
    );
    expectErr(result);
    expect(result.error.type).toBe("READ_FAILED");
    expect(result.error.path).toBe(missing);
  });

  test("digest 為 MD5 十六進位字串", async () => {
    const comparator = new ContentComparatorMd5();
    const result = await comparator.digest(join(tmpDir, "empty1.bin"));
    expectOk(result);
    expect(result.value).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });
});
