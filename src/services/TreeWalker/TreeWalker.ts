import type { Result } from "~shared/utils/Result";

import type { FileEntry } from "@/types";

export type WalkError = {
  type: "ROOT_OPEN_FAILED";
  path: string;
  message: string;
};

export type SkipReason = "NOT_RECURSIVE" | "SYMBOLIC_LINK" | "NOT_REGULAR_FILE";

export type WalkEvent =
  | { type: "directory"; path: string }
  | { type: "file"; entry: FileEntry }
  | { type: "too-new"; entry: FileEntry }
  | { type: "skipped"; path: string; reason: SkipReason }
  | { type: "file-error"; path: string; message: string }
  | { type: "directory-error"; path: string; message: string };

export type WalkOptions = {
  recursive?: boolean;
  /** 修改時間晚於 now - minAgeDays 的檔案會以 too-new 回報 */
  minAgeDays?: number;
  now?: Date;
};

export interface TreeWalker {
  /**
   * 根目錄無法開啟時回傳錯誤；否則回傳惰性的走訪事件序列。
   * 子目錄列舉失敗只會放棄該子樹，以 directory-error 回報。
   */
  walk(
    rootPath: string,
    options?: WalkOptions
  ): Promise<Result<AsyncIterable<WalkEvent>, WalkError>>;
}
