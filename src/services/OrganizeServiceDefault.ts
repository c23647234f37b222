import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import type { OrganizeService, OrganizeSummary } from "./OrganizeService";
import type { PlacementPolicy, PlacementStatus } from "./PlacementPolicy";
import type { TreeWalker, WalkError, WalkOptions } from "./TreeWalker";

const summaryKeyOf: Record<
  PlacementStatus,
  "sameFile" | "merged" | "moved" | "renamed" | "failed"
> = {
  "same-file": "sameFile",
  merged: "merged",
  moved: "moved",
  renamed: "renamed",
  failed: "failed",
};

export class OrganizeServiceDefault implements OrganizeService {
  private readonly walker: TreeWalker;
  private readonly policy: PlacementPolicy;
  private readonly logger: Logger;
  private readonly collectOutcomes: boolean;

  constructor(deps: {
    walker: TreeWalker;
    policy: PlacementPolicy;
    logger: Logger;
    /** 保留每個檔案的處置結果，輸出報告時才需要 */
    collectOutcomes?: boolean;
  }) {
    this.walker = deps.walker;
    this.policy = deps.policy;
    this.logger = deps.logger;
    this.collectOutcomes = deps.collectOutcomes ?? false;
  }

  async run(
    sourceRoot: string,
    options?: WalkOptions
  ): Promise<Result<OrganizeSummary, WalkError>> {
    const walked = await this.walker.walk(sourceRoot, options);
    if (isErr(walked)) return walked;

    const summary: OrganizeSummary = {
      directories: 0,
      tooNew: 0,
      skipped: 0,
      sameFile: 0,
      merged: 0,
      moved: 0,
      renamed: 0,
      failed: 0,
      fileErrors: 0,
      directoryErrors: 0,
      outcomes: [],
    };

    // 逐一處理，不並行
    for await (const event of walked.value) {
      switch (event.type) {
        case "directory":
          summary.directories++;
          this.logger.info({ emoji: "📂" })`處理目錄：${event.path}`;
          break;
        case "too-new":
          summary.tooNew++;
          this.logger.info({
            emoji: "⏭️",
            modifiedAt: event.entry.modifiedAt.toISOString(),
          })`${event.entry.path}：檔案太新，略過`;
          break;
        case "skipped":
          summary.skipped++;
          this.logger.debug({ reason: event.reason })`略過 ${event.path}`;
          break;
        case "file-error":
          summary.fileErrors++;
          this.logger.error({
            file: event.path,
          })`無法讀取檔案資訊 ${event.path}：${event.message}`;
          break;
        case "directory-error":
          summary.directoryErrors++;
          this.logger.error({
            directory: event.path,
          })`無法列出目錄 ${event.path}，略過此子目錄：${event.message}`;
          break;
        case "file": {
          const outcome = await this.policy.place(event.entry);
          summary[summaryKeyOf[outcome.status]]++;
          if (this.collectOutcomes) summary.outcomes.push(outcome);
          break;
        }
      }
    }

    this.logger.info({
      event: "done",
      moved: summary.moved,
      renamed: summary.renamed,
      merged: summary.merged,
      failed: summary.failed,
    })`處理完成：搬移 ${summary.moved}、改名 ${summary.renamed}、合併 ${summary.merged}、失敗 ${summary.failed}`;

    return ok(summary);
  }
}
