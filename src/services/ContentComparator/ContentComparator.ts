import type { Result } from "~shared/utils/Result";

export type CompareError = {
  type: "READ_FAILED";
  path: string;
  message: string;
};

export interface ContentComparator {
  /**
   * 比對兩個檔案內容是否完全相同。
   * 任一檔案讀取失敗時回傳錯誤，由呼叫端決定如何處理。
   */
  isSameContent(
    firstPath: string,
    secondPath: string
  ): Promise<Result<boolean, CompareError>>;
}
