import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { errorMessage } from "@/utils/helper";

import type { CompareError, ContentComparator } from "./ContentComparator";

/**
 * 以 MD5 摘要比對內容；大小不同時不計算摘要。
 * 摘要相同即視為內容相同。
 */
export class ContentComparatorMd5 implements ContentComparator {
  async isSameContent(
    firstPath: string,
    secondPath: string
  ): Promise<Result<boolean, CompareError>> {
    const firstSize = await this.sizeOf(firstPath);
    if (isErr(firstSize)) return firstSize;
    const secondSize = await this.sizeOf(secondPath);
    if (isErr(secondSize)) return secondSize;
    if (firstSize.value !== secondSize.value) return ok(false);

    const firstDigest = await this.digest(firstPath);
    if (isErr(firstDigest)) return firstDigest;
    const secondDigest = await this.digest(secondPath);
    if (isErr(secondDigest)) return secondDigest;
    return ok(firstDigest.value === secondDigest.value);
  }

  async digest(filePath: string): Promise<Result<string, CompareError>> {
    try {
      const hash = createHash("md5");
      for await (const chunk of createReadStream(filePath)) {
        hash.update(chunk);
      }
      return ok(hash.digest("hex"));
    } catch (e) {
      return err(readFailed(filePath, e));
    }
  }

  private async sizeOf(filePath: string): Promise<Result<number, CompareError>> {
    try {
      return ok((await stat(filePath)).size);
    } catch (e) {
      return err(readFailed(filePath, e));
    }
  }
}

function readFailed(filePath: string, e: unknown): CompareError {
  return {
    type: "READ_FAILED",
    path: filePath,
    message: `讀取檔案失敗: ${filePath}: ${errorMessage(e)}`,
  };
}
