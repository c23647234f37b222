import type { Result } from "~shared/utils/Result";

import type { MetadataFields } from "./MetadataValue";

export type MetadataError =
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_METADATA"; message: string };

export interface MetadataExtractor {
  /**
   * 讀取檔案所有可辨識的 metadata 欄位。
   */
  extract(filePath: string): Promise<Result<MetadataFields, MetadataError>>;
}
