import { Value } from "@sinclair/typebox/value";
import type { CAC } from "cac";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { getAppConfig } from "@/config";
import { saveModeSchema, tagModeSchema } from "@/http/schemas";
import { expandHome } from "@/utils/helper";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { buildServices } from "./buildServices";

type Options = {
  tagMode?: string;
  saveMode?: string;
};

export function registerTagImage(cli: CAC, baseLogger: Logger) {
  cli
    .command("tag <file>", "分析單張影像並寫入標籤")
    .option("--tag-mode <mode>", "append 或 overwrite，預設為 AUTOTAG_TAG_MODE")
    .option("--save-mode <mode>", "replace 或 suffix", { default: "replace" })
    .action(async (file: string, options: Options) => {
      const logger = baseLogger.extend("tag", { emoji: "🏷️" });
      const config = getAppConfig();
      const tagMode = options.tagMode ?? config.AUTOTAG_TAG_MODE;
      const saveMode = options.saveMode ?? "replace";
      if (!Value.Check(tagModeSchema, tagMode)) {
        logger.error()`無效的 tag-mode: ${tagMode}`;
        process.exit(1);
      }
      if (!Value.Check(saveModeSchema, saveMode)) {
        logger.error()`無效的 save-mode: ${saveMode}`;
        process.exit(1);
      }

      const filePath = path.resolve(expandHome(file));
      const { validator, pipeline, writer } = buildServices(config, logger);

      const validated = await validator.validate(
        await readFile(filePath),
        path.basename(filePath)
      );
      if (isErr(validated)) {
        logger.error({ error: validated.error })`影像驗證失敗`;
        process.exit(1);
      }

      const outcome = await pipeline.process(filePath);
      if (!outcome.success) {
        logger.error({ error: outcome.error })`影像分析失敗`;
        process.exit(1);
      }

      const written = await writer.write(filePath, outcome.tags, {
        tagMode,
        saveMode,
      });
      if (!written.success) {
        logger.error({ error: written.error })`寫入標籤失敗`;
        process.exit(1);
      }
      logger.info({
        event: "done",
        tags: outcome.tags,
      })`已寫入 ${outcome.tags.length} 個標籤至 ${written.outputPath}`;
    });
}
