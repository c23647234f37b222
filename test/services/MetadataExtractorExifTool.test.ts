import { ExifTool } from "exiftool-vendored";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { dispose } from "~shared/utils/Disposeable";

import {
  MetadataExtractorExifTool,
  readCaptureTime,
} from "@/services/MetadataExtractor";

const tmpDir = "test/tmp/exiftool";

describe("MetadataExtractorExifTool", () => {
  const exiftool = new ExifTool();
  const extractor = new MetadataExtractorExifTool(exiftool);

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  afterAll(async () => {
    await dispose(extractor);
  });

  test("日期欄位還原成 exiftool 原始字串", { timeout: 30_000 }, async () => {
    // exiftool 可以從無到有建立 XMP sidecar
    const sidecar = join(tmpDir, "capture.xmp");
    await exiftool.write(sidecar, { DateTimeOriginal: "2021:03:04 05:06:07" });

    const result = await extractor.extract(sidecar);

    expectOk(result);
    expect(result.value.get("DateTimeOriginal")).toEqual({
      kind: "text",
      value: "2021:03:04 05:06:07",
    });
    const captured = readCaptureTime(result.value);
    expectOk(captured);
    expect(captured.value).toEqual(new Date(2021, 2, 4, 5, 6, 7));
  });

  test("檔案不存在時回傳 READ_FAILED", { timeout: 30_000 }, async () => {
    const missing = join(tmpDir, "missing.jpg");

    const result = await extractor.extract(missing);

    expectErr(result);
    expect(result.error.type).toBe("READ_FAILED");
    expect(result.error.message).toContain(missing);
  });
});
