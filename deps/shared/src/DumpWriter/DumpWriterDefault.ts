import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly outputDir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {}

  async dump(name: string, data: unknown) {
    await mkdir(this.outputDir, { recursive: true });
    const stamp = format(this.now(), "yyyyMMdd-HHmmss");
    const filePath = path.join(this.outputDir, `${stamp}-${name}.json`);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", file: filePath })`報告已輸出：${name}`;
    return filePath;
  }
}
