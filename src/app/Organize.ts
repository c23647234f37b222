import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { ContentComparatorMd5 } from "@/services/ContentComparator";
import { MetadataExtractorExifTool } from "@/services/MetadataExtractor";
import { NameAllocatorDefault } from "@/services/NameAllocator";
import type { OrganizeSummary } from "@/services/OrganizeService";
import { OrganizeServiceDefault } from "@/services/OrganizeServiceDefault";
import { PlacementPolicyDefault } from "@/services/PlacementPolicy";
import { TreeWalkerDefault } from "@/services/TreeWalker";
import type { OrganizeOptions } from "@/types";
import { expandHome, parseInteger } from "@/utils/helper";

type OrganizeCliOptions = {
  recursive?: boolean;
  dry?: boolean;
  days?: number | string;
  exif?: boolean;
  /** `--report` 不帶值時為 true */
  report?: string | boolean;
};

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("[source] [destination]", "依檔案時間將來源檔案整理到 目的地/年/月")
    .option("-r, --recursive", "遞迴處理子目錄", { default: false })
    .option("--dry", "試跑：只輸出處置結果，不異動任何檔案", {
      default: false,
    })
    .option("-d, --days <days>", "只處理修改時間超過指定天數的檔案", {
      default: 0,
    })
    .option("--exif", "優先使用 EXIF 拍攝時間（需要 perl）", {
      default: false,
    })
    .option("--report [dir]", "輸出執行摘要 JSON，預設目錄 dist/reports")
    .example("organize -r -d 30 ~/phone/camera ~/pictures/archive")
    .action(
      async (
        source: string | undefined,
        destination: string | undefined,
        cliOptions: OrganizeCliOptions
      ) => {
        if (!source || !destination) {
          baseLogger.error({ emoji: "❓" })`未指定來源 (SRC) 或目的地 (DST) 目錄`;
          cli.outputHelp();
          return;
        }

        const minAgeDays = parseInteger(cliOptions.days ?? 0);
        if (minAgeDays === undefined || minAgeDays < 0) {
          baseLogger.error({ days: cliOptions.days })`天數必須是非負整數`;
          process.exitCode = 1;
          return;
        }
        const options: OrganizeOptions = {
          recursive: cliOptions.recursive ?? false,
          dryRun: cliOptions.dry ?? false,
          minAgeDays,
          useMetadata: cliOptions.exif ?? false,
        };

        const sourceRoot = expandHome(source);
        const destinationRoot = expandHome(destination);
        const logger = baseLogger.extend("organize", {
          dryRun: options.dryRun,
        });
        logger.info({
          event: "start",
          options,
        })`來源: ${sourceRoot} → 目的地: ${destinationRoot}`;

        // 整次執行共用一個 exiftool 程序，結束時一定釋放
        const metadataExtractor = options.useMetadata
          ? new MetadataExtractorExifTool()
          : undefined;
        try {
          const service = new OrganizeServiceDefault({
            walker: new TreeWalkerDefault(),
            policy: new PlacementPolicyDefault({
              destinationRoot,
              dryRun: options.dryRun,
              nameAllocator: new NameAllocatorDefault(),
              contentComparator: new ContentComparatorMd5(),
              metadataExtractor,
              logger,
            }),
            logger,
            collectOutcomes: Boolean(cliOptions.report),
          });

          const result = await service.run(sourceRoot, {
            recursive: options.recursive,
            minAgeDays: options.minAgeDays,
          });
          if (isErr(result)) {
            logger.error({
              error: result.error,
            })`無法開啟來源目錄 ${sourceRoot}：${result.error.message}`;
            process.exitCode = 1;
            return;
          }

          if (cliOptions.report) {
            const reportDir =
              typeof cliOptions.report === "string"
                ? expandHome(cliOptions.report)
                : undefined;
            await new DumpWriterDefault(logger, reportDir).dump(
              "organize-summary",
              toReport(sourceRoot, destinationRoot, options, result.value)
            );
          }
        } finally {
          if (metadataExtractor) await dispose(metadataExtractor);
        }
      }
    );
}

function toReport(
  source: string,
  destination: string,
  options: OrganizeOptions,
  summary: OrganizeSummary
) {
  const { outcomes, ...counts } = summary;
  return {
    source,
    destination,
    options,
    counts,
    failures: outcomes
      .filter((o) => o.status === "failed")
      .map((o) => ({ from: o.sourcePath, to: o.targetPath, error: o.error })),
    placements: outcomes
      .filter((o) => o.status !== "failed")
      .map((o) => ({ from: o.sourcePath, to: o.targetPath, status: o.status })),
  };
}
