import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerServe } from "./app/Serve";
import { registerShowTags } from "./app/ShowTags";
import { registerTagFolder } from "./app/TagFolder";
import { registerTagImage } from "./app/TagImage";

const logger = createDefaultLoggerFromEnv();
const cli = cac("autotag");

registerServe(cli, logger);
registerTagImage(cli, logger);
registerTagFolder(cli, logger);
registerShowTags(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger[Symbol.asyncDispose]();
}
