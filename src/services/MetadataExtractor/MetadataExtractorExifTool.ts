import { ExifDate, ExifDateTime, ExifTool, type Tags } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage } from "@/utils/helper";

import type { MetadataError, MetadataExtractor } from "./MetadataExtractor";
import {
  type MetadataFields,
  type MetadataValue,
  toMetadataValue,
} from "./MetadataValue";

/**
 * 以 exiftool 讀取 metadata。
 * 每次執行只開一個 exiftool 程序，結束時必須釋放。
 */
export class MetadataExtractorExifTool implements MetadataExtractor {
  constructor(private readonly exiftool: ExifTool = new ExifTool()) {}

  async extract(
    filePath: string
  ): Promise<Result<MetadataFields, MetadataError>> {
    let tags: Tags;
    try {
      tags = await this.exiftool.read(filePath);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 metadata 失敗: ${filePath}: ${errorMessage(e)}`,
      });
    }

    const fields = new Map<string, MetadataValue>();
    for (const [name, raw] of Object.entries(tags)) {
      const value = toFieldValue(raw);
      if (value) fields.set(name, value);
    }
    if (fields.size === 0) {
      return err({
        type: "NO_METADATA",
        message: `無 metadata: ${filePath}`,
      });
    }
    return ok(fields);
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}

// exiftool-vendored 會把日期轉成物件，這裡還原成 exiftool 原始字串
function toFieldValue(raw: unknown): MetadataValue | undefined {
  if (raw instanceof ExifDateTime || raw instanceof ExifDate) {
    return raw.rawValue === undefined
      ? undefined
      : { kind: "text", value: raw.rawValue };
  }
  return toMetadataValue(raw);
}
