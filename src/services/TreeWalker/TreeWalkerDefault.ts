import { subDays } from "date-fns";
import type { Dir, Stats } from "node:fs";
import { opendir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileEntry } from "@/types";
import { errorMessage } from "@/utils/helper";

import type {
  TreeWalker,
  WalkError,
  WalkEvent,
  WalkOptions,
} from "./TreeWalker";

type ResolvedOptions = { recursive: boolean; cutoff: Date };

/**
 * 以待處理佇列逐層走訪：目前目錄的檔案全部產出後，才進入排隊中的子目錄。
 * 不跟隨 symbolic link，因此不會因連結形成的迴圈而無限走訪。
 */
export class TreeWalkerDefault implements TreeWalker {
  async walk(
    rootPath: string,
    options?: WalkOptions
  ): Promise<Result<AsyncIterable<WalkEvent>, WalkError>> {
    // 先確認根目錄能開啟，實際列舉時再重新開啟，避免序列未被消費時留下 handle
    try {
      const root = await opendir(rootPath);
      await root.close();
    } catch (e) {
      return err({
        type: "ROOT_OPEN_FAILED",
        path: rootPath,
        message: errorMessage(e),
      });
    }

    const resolved: ResolvedOptions = {
      recursive: options?.recursive ?? false,
      cutoff: subDays(options?.now ?? new Date(), options?.minAgeDays ?? 0),
    };
    return ok(this.iterate(rootPath, resolved));
  }

  private async *iterate(
    rootPath: string,
    options: ResolvedOptions
  ): AsyncGenerator<WalkEvent> {
    const pending = [rootPath];
    for (
      let current = pending.shift();
      current !== undefined;
      current = pending.shift()
    ) {
      yield* this.readDirectory(current, options, pending);
    }
  }

  private async *readDirectory(
    dirPath: string,
    options: ResolvedOptions,
    pending: string[]
  ): AsyncGenerator<WalkEvent> {
    yield { type: "directory", path: dirPath };

    let dir: Dir;
    try {
      dir = await opendir(dirPath);
    } catch (e) {
      yield { type: "directory-error", path: dirPath, message: errorMessage(e) };
      return;
    }

    // for await 結束、中斷或拋錯時都會關閉 dir
    try {
      for await (const dirent of dir) {
        const fullPath = path.join(dirPath, dirent.name);

        if (dirent.isSymbolicLink()) {
          yield { type: "skipped", path: fullPath, reason: "SYMBOLIC_LINK" };
          continue;
        }
        if (dirent.isDirectory()) {
          if (options.recursive) pending.push(fullPath);
          else yield { type: "skipped", path: fullPath, reason: "NOT_RECURSIVE" };
          continue;
        }
        if (!dirent.isFile()) {
          yield { type: "skipped", path: fullPath, reason: "NOT_REGULAR_FILE" };
          continue;
        }

        let stats: Stats;
        try {
          stats = await stat(fullPath);
        } catch (e) {
          yield { type: "file-error", path: fullPath, message: errorMessage(e) };
          continue;
        }

        const entry: FileEntry = {
          path: fullPath,
          name: dirent.name,
          modifiedAt: stats.mtime,
          identity: { dev: stats.dev, ino: stats.ino },
          size: stats.size,
        };
        if (stats.mtime.getTime() > options.cutoff.getTime()) {
          yield { type: "too-new", entry };
        } else {
          yield { type: "file", entry };
        }
      }
    } catch (e) {
      yield { type: "directory-error", path: dirPath, message: errorMessage(e) };
    }
  }
}
