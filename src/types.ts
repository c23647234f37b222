/** 同一個實體檔案的識別（device + inode） */
export type FileIdentity = { dev: number; ino: number };

/**
 * 走訪時對來源檔案拍下的快照，之後不再更新。
 */
export type FileEntry = {
  path: string;
  name: string;
  modifiedAt: Date;
  identity: FileIdentity;
  size: number;
};

export type OrganizeOptions = {
  recursive: boolean;
  dryRun: boolean;
  /** 只處理修改時間早於 now - minAgeDays 的檔案 */
  minAgeDays: number;
  /** 優先使用 metadata 中的拍攝時間 */
  useMetadata: boolean;
};
