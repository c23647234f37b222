import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerOrganize } from "./app/Organize";

const logger = createDefaultLoggerFromEnv();
const cli = cac("organize");

registerOrganize(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

try {
  if (cli.matchedCommand) {
    await cli.runMatchedCommand();
  }
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
