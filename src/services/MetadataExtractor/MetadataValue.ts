/**
 * metadata 欄位值：exiftool 回傳的值可能是文字、整數或浮點數。
 */
export type MetadataValue =
  | { kind: "text"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number };

export type MetadataFields = ReadonlyMap<string, MetadataValue>;

export function toMetadataValue(raw: unknown): MetadataValue | undefined {
  if (typeof raw === "string") return { kind: "text", value: raw };
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return Number.isInteger(raw)
      ? { kind: "integer", value: raw }
      : { kind: "float", value: raw };
  }
  return undefined;
}

/**
 * - text：原樣
 * - integer：十進位
 * - float：可還原原值的最短十進位表示
 */
export function stringifyMetadataValue(value: MetadataValue): string {
  switch (value.kind) {
    case "text":
      return value.value;
    case "integer":
      return value.value.toString(10);
    case "float":
      return String(value.value);
  }
}
