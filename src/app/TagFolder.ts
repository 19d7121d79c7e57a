import { Value } from "@sinclair/typebox/value";
import type { CAC } from "cac";
import path from "node:path";

import { getAppConfig } from "@/config";
import { saveModeSchema } from "@/http/schemas";
import { expandHome, isDirectory } from "@/utils/helper";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";

import { buildServices } from "./buildServices";

type Options = {
  recursive?: boolean;
  saveMode?: string;
};

const progressIntervalMs = 5_000;

export function registerTagFolder(cli: CAC, baseLogger: Logger) {
  cli
    .command("tag-folder <folder>", "批次標記資料夾內的影像，完成後輸出狀態報告")
    .option("--recursive", "包含子資料夾", { default: false })
    .option("--save-mode <mode>", "replace 或 suffix", { default: "replace" })
    .action(async (folder: string, options: Options) => {
      const logger = baseLogger.extend("tag-folder", { emoji: "📂" });
      const config = getAppConfig();
      const saveMode = options.saveMode ?? "replace";
      if (!Value.Check(saveModeSchema, saveMode)) {
        logger.error()`無效的 save-mode: ${saveMode}`;
        process.exit(1);
      }
      const root = path.resolve(expandHome(folder));
      if (!(await isDirectory(root))) {
        logger.error()`找不到資料夾: ${root}`;
        process.exit(1);
      }

      const { orchestrator, store } = buildServices(config, logger);
      orchestrator.start({
        path: root,
        recursive: options.recursive ?? false,
        saveMode,
        tagMode: config.AUTOTAG_TAG_MODE,
      });

      const timer = setInterval(() => {
        const s = store.snapshot();
        logger.info({
          eta: s.etaFormatted,
        })`${s.phase} ${s.processedFiles}/${s.totalFiles} ${s.currentFile}`;
      }, progressIntervalMs);
      try {
        await orchestrator.idle();
      } finally {
        clearInterval(timer);
      }

      const final = store.snapshot();
      const dumper = new DumpWriterDefault(logger, config.AUTOTAG_REPORT_DIR);
      await dumper.dump("tag-folder", final);

      if (final.phase === "error") {
        logger.error({ errors: final.errors.length })`批次處理失敗`;
        process.exit(1);
      }
      if (final.failedFiles > 0) {
        logger.warn({
          failed: final.failedFiles,
        })`${final.failedFiles} 個檔案處理失敗`;
      }
      logger.info({
        event: "done",
      })`完成 ${final.successfulFiles}/${final.totalFiles}，耗時 ${final.runtimeFormatted}`;
    });
}
