import type { Result } from "~shared/utils/Result";

import type { PlacementOutcome } from "./PlacementPolicy";
import type { WalkError, WalkOptions } from "./TreeWalker";

export interface OrganizeService {
  /**
   * 走訪來源目錄並逐一處置檔案。
   * 只有根目錄無法開啟時回傳錯誤，其他錯誤都會記錄後繼續。
   */
  run(
    sourceRoot: string,
    options?: WalkOptions
  ): Promise<Result<OrganizeSummary, WalkError>>;
}

export type OrganizeSummary = {
  directories: number;
  tooNew: number;
  skipped: number;
  sameFile: number;
  merged: number;
  moved: number;
  renamed: number;
  failed: number;
  fileErrors: number;
  directoryErrors: number;
  /** 只有設定 collectOutcomes 時才會填入 */
  outcomes: PlacementOutcome[];
};
