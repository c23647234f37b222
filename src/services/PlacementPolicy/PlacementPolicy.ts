import type { Result } from "~shared/utils/Result";

import type { FileEntry } from "@/types";

/**
 * 單一檔案的處置決策，產生後只使用一次。
 * - skip：目標就是來源本身
 * - merge：目標內容相同，刪除來源
 * - move：搬到 targetPath；renamed 表示因撞名而改用新名稱
 */
export type PlacementDecision =
  | { type: "skip"; reason: "SAME_FILE"; targetPath: string }
  | { type: "merge"; targetPath: string }
  | { type: "move"; targetPath: string; renamed: boolean };

export type PlacementErrorType =
  | "TARGET_STAT_FAILED"
  | "NAME_ALLOCATION_FAILED"
  | "MKDIR_FAILED"
  | "RENAME_FAILED"
  | "COPY_FAILED"
  | "REMOVE_FAILED";

export type PlacementError = { type: PlacementErrorType; message: string };

export type PlacementStatus =
  | "same-file"
  | "merged"
  | "moved"
  | "renamed"
  | "failed";

export type PlacementOutcome = {
  sourcePath: string;
  status: PlacementStatus;
  targetPath?: string;
  error?: PlacementError;
};

export type EffectiveTimestamp = {
  time: Date;
  source: "metadata" | "modified-time";
};

export interface PlacementPolicy {
  /** metadata 拍攝時間可用時優先，否則使用修改時間 */
  resolveTimestamp(entry: FileEntry): Promise<EffectiveTimestamp>;

  decide(entry: FileEntry): Promise<Result<PlacementDecision, PlacementError>>;

  /**
   * 執行決策。失敗時來源檔案維持在原位置。
   * dry run 時不做任何檔案異動。
   */
  execute(
    entry: FileEntry,
    decision: PlacementDecision
  ): Promise<Result<void, PlacementError>>;

  /** decide + execute，並輸出處置結果 */
  place(entry: FileEntry): Promise<PlacementOutcome>;
}
