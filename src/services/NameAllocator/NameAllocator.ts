export interface NameAllocator {
  /**
   * 在目標目錄中找出第一個不存在的 `base_N.ext`（N 從 1 開始），回傳完整路徑。
   * 每個候選名稱都會重新檢查檔案系統，不做快取。
   */
  allocate(targetDir: string, fileName: string): Promise<string>;
}

export type SplitName = {
  base: string;
  ext: string;
};
