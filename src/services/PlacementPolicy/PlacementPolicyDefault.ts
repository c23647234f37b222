import { format } from "date-fns";
import { type Stats, constants } from "node:fs";
import {
  copyFile,
  mkdir,
  rename,
  rm,
  stat,
  unlink,
  utimes,
} from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { ContentComparator } from "@/services/ContentComparator";
import { readCaptureTime } from "@/services/MetadataExtractor/CaptureTime";
import type { MetadataExtractor } from "@/services/MetadataExtractor/MetadataExtractor";
import type { NameAllocator } from "@/services/NameAllocator";
import type { FileEntry } from "@/types";
import { errorMessage, exists, hasErrorCode } from "@/utils/helper";

import type {
  EffectiveTimestamp,
  PlacementDecision,
  PlacementError,
  PlacementErrorType,
  PlacementOutcome,
  PlacementPolicy,
  PlacementStatus,
} from "./PlacementPolicy";

export type RenameFile = (from: string, to: string) => Promise<void>;

/** 目的地/yyyy/MM，以本地時間計算 */
export function targetDirectoryFor(destinationRoot: string, time: Date) {
  return path.join(destinationRoot, format(time, "yyyy"), format(time, "MM"));
}

export class PlacementPolicyDefault implements PlacementPolicy {
  private readonly destinationRoot: string;
  private readonly dryRun: boolean;
  private readonly nameAllocator: NameAllocator;
  private readonly contentComparator: ContentComparator;
  private readonly metadataExtractor?: MetadataExtractor;
  private readonly renameFile: RenameFile;
  private readonly logger: Logger;

  constructor(deps: {
    destinationRoot: string;
    dryRun: boolean;
    nameAllocator: NameAllocator;
    contentComparator: ContentComparator;
    /** 有提供時才會嘗試讀取拍攝時間 */
    metadataExtractor?: MetadataExtractor;
    renameFile?: RenameFile;
    logger: Logger;
  }) {
    this.destinationRoot = deps.destinationRoot;
    this.dryRun = deps.dryRun;
    this.nameAllocator = deps.nameAllocator;
    this.contentComparator = deps.contentComparator;
    this.metadataExtractor = deps.metadataExtractor;
    this.renameFile = deps.renameFile ?? rename;
    this.logger = deps.logger.extend("placement");
  }

  async resolveTimestamp(entry: FileEntry): Promise<EffectiveTimestamp> {
    const fallback: EffectiveTimestamp = {
      time: entry.modifiedAt,
      source: "modified-time",
    };
    if (!this.metadataExtractor) return fallback;

    const fields = await this.metadataExtractor.extract(entry.path);
    if (isErr(fields)) {
      this.logger.warn({
        file: entry.path,
        error: fields.error,
      })`${fields.error.message}，改用修改時間`;
      return fallback;
    }
    const captured = readCaptureTime(fields.value);
    if (isErr(captured)) {
      this.logger.warn({
        file: entry.path,
        error: captured.error,
      })`${captured.error.message}，改用修改時間`;
      return fallback;
    }
    return { time: captured.value, source: "metadata" };
  }

  async decide(
    entry: FileEntry
  ): Promise<Result<PlacementDecision, PlacementError>> {
    const { time } = await this.resolveTimestamp(entry);
    const targetDir = targetDirectoryFor(this.destinationRoot, time);
    const targetPath = path.join(targetDir, entry.name);

    let existing: Stats;
    try {
      existing = await stat(targetPath);
    } catch (e) {
      if (hasErrorCode(e, "ENOENT")) {
        return ok({ type: "move", targetPath, renamed: false });
      }
      return failure("TARGET_STAT_FAILED", `無法檢查目標 ${targetPath}`, e);
    }

    if (
      existing.dev === entry.identity.dev &&
      existing.ino === entry.identity.ino
    ) {
      return ok({ type: "skip", reason: "SAME_FILE", targetPath });
    }

    const sameContent = await this.contentComparator.isSameContent(
      entry.path,
      targetPath
    );
    if (isErr(sameContent)) {
      // 無法確認內容時走改名路徑，不刪除任何檔案
      this.logger.warn({
        file: entry.path,
        error: sameContent.error,
      })`${sameContent.error.message}，視為不同檔案`;
    } else if (sameContent.value) {
      return ok({ type: "merge", targetPath });
    }

    try {
      const renamedPath = await this.nameAllocator.allocate(
        targetDir,
        entry.name
      );
      return ok({ type: "move", targetPath: renamedPath, renamed: true });
    } catch (e) {
      return failure("NAME_ALLOCATION_FAILED", `無法產生新檔名`, e);
    }
  }

  async execute(
    entry: FileEntry,
    decision: PlacementDecision
  ): Promise<Result<void, PlacementError>> {
    switch (decision.type) {
      case "skip":
        return ok();
      case "merge":
        return this.removeSource(entry);
      case "move":
        return this.moveTo(entry, decision.targetPath);
    }
  }

  async place(entry: FileEntry): Promise<PlacementOutcome> {
    const decided = await this.decide(entry);
    if (isErr(decided)) {
      return this.report({
        sourcePath: entry.path,
        status: "failed",
        error: decided.error,
      });
    }
    const decision = decided.value;
    const executed = await this.execute(entry, decision);
    if (isErr(executed)) {
      return this.report({
        sourcePath: entry.path,
        status: "failed",
        targetPath: decision.targetPath,
        error: executed.error,
      });
    }
    return this.report({
      sourcePath: entry.path,
      status: statusOf(decision),
      targetPath: decision.targetPath,
    });
  }

  private async removeSource(
    entry: FileEntry
  ): Promise<Result<void, PlacementError>> {
    if (this.dryRun) return ok();
    try {
      await unlink(entry.path);
      return ok();
    } catch (e) {
      return failure("REMOVE_FAILED", `無法移除來源 ${entry.path}`, e);
    }
  }

  private async moveTo(
    entry: FileEntry,
    targetPath: string
  ): Promise<Result<void, PlacementError>> {
    if (this.dryRun) return ok();

    const prepared = await this.ensureDirectory(
      path.dirname(entry.path),
      path.dirname(targetPath)
    );
    if (isErr(prepared)) return prepared;

    try {
      await this.renameFile(entry.path, targetPath);
      return ok();
    } catch (e) {
      if (!hasErrorCode(e, "EXDEV")) {
        return failure("RENAME_FAILED", `無法搬移至 ${targetPath}`, e);
      }
    }
    return this.copyAcrossDevices(entry, targetPath);
  }

  /** 目標目錄不存在時建立，權限沿用來源目錄（至少保留擁有者的 rwx） */
  private async ensureDirectory(
    sourceDir: string,
    targetDir: string
  ): Promise<Result<void, PlacementError>> {
    if (await exists(targetDir)) return ok();
    try {
      const { mode } = await stat(sourceDir);
      await mkdir(targetDir, { recursive: true, mode: (mode & 0o777) | 0o700 });
      return ok();
    } catch (e) {
      return failure("MKDIR_FAILED", `無法建立目錄 ${targetDir}`, e);
    }
  }

  /**
   * 跨裝置時 rename 會失敗：複製 → 驗證內容 → 刪除來源。
   * 任何一步失敗都會清掉複本，來源保持不動。
   */
  private async copyAcrossDevices(
    entry: FileEntry,
    targetPath: string
  ): Promise<Result<void, PlacementError>> {
    try {
      await copyFile(entry.path, targetPath, constants.COPYFILE_EXCL);
    } catch (e) {
      // 目標在這段期間被建立時，不能清掉別人的檔案
      if (hasErrorCode(e, "EEXIST")) {
        return failure("COPY_FAILED", `目標已存在 ${targetPath}`, e);
      }
      return this.discardCopy(targetPath, `跨裝置複製失敗: ${errorMessage(e)}`);
    }

    const verified = await this.contentComparator.isSameContent(
      entry.path,
      targetPath
    );
    if (isErr(verified)) {
      return this.discardCopy(targetPath, verified.error.message);
    }
    if (!verified.value) {
      return this.discardCopy(targetPath, `複本內容與來源不一致`);
    }

    try {
      await utimes(targetPath, entry.modifiedAt, entry.modifiedAt);
    } catch (e) {
      this.logger.warn({
        file: targetPath,
        error: e,
      })`無法保留修改時間 ${targetPath}`;
    }

    try {
      await unlink(entry.path);
      return ok();
    } catch (e) {
      return failure(
        "REMOVE_FAILED",
        `已複製到 ${targetPath}，但無法移除來源 ${entry.path}`,
        e
      );
    }
  }

  private async discardCopy(
    targetPath: string,
    reason: string
  ): Promise<Result<void, PlacementError>> {
    try {
      await rm(targetPath, { force: true });
      return err({ type: "COPY_FAILED", message: reason });
    } catch (e) {
      return failure(
        "COPY_FAILED",
        `${reason}；清除不完整的複本 ${targetPath} 失敗`,
        e
      );
    }
  }

  private report(outcome: PlacementOutcome) {
    const { sourcePath, targetPath, error } = outcome;
    const logger = this.logger.append({ event: outcome.status });
    switch (outcome.status) {
      case "same-file":
        logger.info({ emoji: "🔁" })`${sourcePath} → ${targetPath}：同一個檔案，略過`;
        break;
      case "merged":
        logger.info({
          emoji: "🧹",
        })`${sourcePath} → ${targetPath}：內容相同，${this.dryRun ? "將移除" : "已移除"}來源`;
        break;
      case "moved":
        logger.info({
          emoji: "📦",
        })`${sourcePath} → ${targetPath}：${this.dryRun ? "將搬移" : "已搬移"}`;
        break;
      case "renamed":
        logger.info({
          emoji: "🏷️",
        })`${sourcePath} → ${targetPath}：目標已有不同檔案，${this.dryRun ? "將改名搬移" : "已改名搬移"}`;
        break;
      case "failed":
        logger.error({ error })`${sourcePath}：${error?.message}`;
        break;
    }
    return outcome;
  }
}

function statusOf(decision: PlacementDecision): PlacementStatus {
  switch (decision.type) {
    case "skip":
      return "same-file";
    case "merge":
      return "merged";
    case "move":
      return decision.renamed ? "renamed" : "moved";
  }
}

function failure(
  type: PlacementErrorType,
  message: string,
  e: unknown
): Result<never, PlacementError> {
  return err({ type, message: `${message}: ${errorMessage(e)}` });
}
