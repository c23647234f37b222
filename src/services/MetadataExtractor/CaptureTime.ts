import { isValid, parse } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

import { type MetadataFields, stringifyMetadataValue } from "./MetadataValue";

/** 依優先順序嘗試的拍攝時間欄位 */
export const captureTimeFields = [
  "DateTimeOriginal",
  "CreateDate",
  "ModifyDate",
] as const;

const EXIF_DATE_TIME_FORMAT = "yyyy:MM:dd HH:mm:ss";

export type CaptureTimeError =
  | { type: "NO_CAPTURE_TIME"; message: string }
  | { type: "PARSE_FAILED"; message: string };

/**
 * 從 metadata 取得拍攝時間。
 * 採用第一個存在的欄位，只取前 19 個字元（去掉秒以下與時區）並以本地時間解析。
 */
export function readCaptureTime(
  fields: MetadataFields
): Result<Date, CaptureTimeError> {
  const field = captureTimeFields.find((name) => fields.has(name));
  const value = field ? fields.get(field) : undefined;
  if (!field || !value) {
    return err({
      type: "NO_CAPTURE_TIME",
      message: `找不到拍攝時間欄位 (${captureTimeFields.join(", ")})`,
    });
  }

  const text = stringifyMetadataValue(value).slice(0, 19);
  const time = parse(text, EXIF_DATE_TIME_FORMAT, new Date());
  if (!isValid(time)) {
    return err({
      type: "PARSE_FAILED",
      message: `無法解析 ${field}: ${text}`,
    });
  }
  return ok(time);
}
