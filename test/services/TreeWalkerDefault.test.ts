import { mkdir, rm, symlink, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { TreeWalkerDefault, type WalkEvent } from "@/services/TreeWalker";

const tmpDir = "test/tmp/walker";
const oldTime = new Date("2023-06-15T12:00:00Z");
const newTime = new Date("2023-06-28T12:00:00Z");
const now = new Date("2023-07-01T00:00:00Z");

async function seedFile(relativePath: string, mtime = oldTime) {
  const fullPath = join(tmpDir, relativePath);
  await writeFile(fullPath, relativePath);
  await utimes(fullPath, mtime, mtime);
  return fullPath;
}

async function collect(events: AsyncIterable<WalkEvent>) {
  const list: WalkEvent[] = [];
  for await (const event of events) list.push(event);
  return list;
}

function pathsOf(events: WalkEvent[], type: "file" | "too-new") {
  return events
    .flatMap((e) => (e.type === type ? [e.entry.path] : []))
    .sort();
}

describe("TreeWalkerDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "sub", "deeper"), { recursive: true });
  });

  test("非遞迴時只列出根目錄檔案，子目錄以 skipped 回報", async () => {
    const a = await seedFile("a.jpg");
    await seedFile("sub/b.jpg");

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { now });
    expectOk(result);
    const events = await collect(result.value);

    expect(pathsOf(events, "file")).toEqual([a]);
    expect(events).toContainEqual({
      type: "skipped",
      path: join(tmpDir, "sub"),
      reason: "NOT_RECURSIVE",
    });
    expect(events.filter((e) => e.type === "directory")).toEqual([
      { type: "directory", path: tmpDir },
    ]);
  });

  test("遞迴時先處理目前目錄的檔案，再進入子目錄", async () => {
    const a = await seedFile("a.jpg");
    const b = await seedFile("sub/b.jpg");
    const c = await seedFile("sub/deeper/c.jpg");

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { recursive: true, now });
    expectOk(result);
    const events = await collect(result.value);

    expect(pathsOf(events, "file")).toEqual([a, b, c].sort());
    const directories = events.flatMap((e) =>
      e.type === "directory" ? [e.path] : []
    );
    expect(directories).toEqual([
      tmpDir,
      join(tmpDir, "sub"),
      join(tmpDir, "sub", "deeper"),
    ]);

    const indexOf = (predicate: (e: WalkEvent) => boolean) =>
      events.findIndex(predicate);
    const rootFile = indexOf((e) => e.type === "file" && e.entry.path === a);
    const subDir = indexOf(
      (e) => e.type === "directory" && e.path === join(tmpDir, "sub")
    );
    expect(rootFile).toBeLessThan(subDir);
  });

  test("修改時間晚於 now - days 的檔案以 too-new 回報", async () => {
    const old = await seedFile("old.jpg", oldTime);
    const fresh = await seedFile("fresh.jpg", newTime);

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { minAgeDays: 10, now });
    expectOk(result);
    const events = await collect(result.value);

    expect(pathsOf(events, "file")).toEqual([old]);
    expect(pathsOf(events, "too-new")).toEqual([fresh]);
  });

  test("days 為 0 時只略過未來時間的檔案", async () => {
    const old = await seedFile("old.jpg", oldTime);
    const future = await seedFile("future.jpg", new Date("2023-07-02T00:00:00Z"));

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { now });
    expectOk(result);
    const events = await collect(result.value);

    expect(pathsOf(events, "file")).toEqual([old]);
    expect(pathsOf(events, "too-new")).toEqual([future]);
  });

  test("FileEntry 帶有修改時間、大小與識別資訊", async () => {
    const a = await seedFile("a.jpg");

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { now });
    expectOk(result);
    const events = await collect(result.value);
    const entry = events.flatMap((e) => (e.type === "file" ? [e.entry] : []))[0];

    expect(entry.path).toBe(a);
    expect(entry.name).toBe("a.jpg");
    expect(entry.modifiedAt.getTime()).toBe(oldTime.getTime());
    expect(entry.size).toBe("a.jpg".length);
    expect(entry.identity.ino).toBeGreaterThan(0);
  });

  test("不跟隨 symbolic link，迴圈連結不會造成無限走訪", async () => {
    await seedFile("sub/b.jpg");
    const loop = join(tmpDir, "sub", "loop");
    await symlink("..", loop);
    const link = join(tmpDir, "link.jpg");
    await symlink("sub/b.jpg", link);

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { recursive: true, now });
    expectOk(result);
    const events = await collect(result.value);

    expect(events).toContainEqual({
      type: "skipped",
      path: loop,
      reason: "SYMBOLIC_LINK",
    });
    expect(events).toContainEqual({
      type: "skipped",
      path: link,
      reason: "SYMBOLIC_LINK",
    });
    expect(pathsOf(events, "file")).toEqual([join(tmpDir, "sub", "b.jpg")]);
  });

  test("子目錄無法列出時回報 directory-error，略過該子目錄並繼續走訪", async () => {
    await rm(join(tmpDir, "sub"), { recursive: true });
    await mkdir(join(tmpDir, "a"));
    await mkdir(join(tmpDir, "b"));
    const rootFile = await seedFile("root.jpg");
    await seedFile("a/y.jpg");
    const kept = await seedFile("b/x.jpg");
    const doomed = join(tmpDir, "a");

    const walker = new TreeWalkerDefault();
    const result = await walker.walk(tmpDir, { recursive: true, now });
    expectOk(result);
    const events: WalkEvent[] = [];
    for await (const event of result.value) {
      events.push(event);
      // 進入 a 之前才刪除，使 opendir 失敗
      if (event.type === "directory" && event.path === doomed) {
        await rm(doomed, { recursive: true });
      }
    }

    expect(events).toContainEqual({
      type: "directory-error",
      path: doomed,
      message: expect.stringContaining("ENOENT"),
    });
    expect(pathsOf(events, "file")).toEqual([kept, rootFile].sort());
    expect(events.filter((e) => e.type === "directory-error")).toHaveLength(1);
  });

  test("根目錄不存在時回傳錯誤", async () => {
    const walker = new TreeWalkerDefault();
    const result = await walker.walk(join(tmpDir, "no_such_dir"));
    expectErr(result);
    expect(result.error.type).toBe("ROOT_OPEN_FAILED");
    expect(result.error.path).toBe(join(tmpDir, "no_such_dir"));
  });

  test("根目錄是檔案時回傳錯誤", async () => {
    const file = await seedFile("a.jpg");
    const walker = new TreeWalkerDefault();
    const result = await walker.walk(file);
    expectErr(result);
    expect(result.error.type).toBe("ROOT_OPEN_FAILED");
  });
});
