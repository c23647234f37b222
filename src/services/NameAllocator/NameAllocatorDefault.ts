import path from "node:path";

import { exists } from "@/utils/helper";

import type { NameAllocator, SplitName } from "./NameAllocator";

/**
 * 以最後一個 `.` 切開主檔名與副檔名：
 * - `photo.jpg` → photo / jpg
 * - `archive.tar.gz` → archive.tar / gz
 * - `README` → README / (空)
 */
export function splitName(fileName: string): SplitName {
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return { base: fileName, ext: "" };
  return { base: fileName.slice(0, dot), ext: fileName.slice(dot + 1) };
}

/**
 * `base_N.ext`。沒有副檔名時不留結尾的 `.`：`README` → `README_1`，不是 `README_1.`
 */
export function suffixedName({ base, ext }: SplitName, n: number) {
  return ext === "" ? `${base}_${n}` : `${base}_${n}.${ext}`;
}

export class NameAllocatorDefault implements NameAllocator {
  async allocate(targetDir: string, fileName: string) {
    const split = splitName(fileName);
    for (let n = 1; n <= Number.MAX_SAFE_INTEGER; n++) {
      const candidate = path.join(targetDir, suffixedName(split, n));
      if (!(await exists(candidate))) return candidate;
    }
    throw new Error(`無法為 ${fileName} 在 ${targetDir} 產生不重複的名稱`);
  }
}
