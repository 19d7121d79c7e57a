import { copyFile } from "node:fs/promises";
import path from "node:path";

import { tagsField, taggedSuffix } from "@/constants";
import type { CommandRunner } from "@/services/CommandRunner";
import type { Tag, TagMode } from "@/types";
import { errorMessage } from "@/utils/helper";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type {
  MetadataWriter,
  WriteOptions,
  WriteOutcome,
} from "./MetadataWriter";

export function taggedPathOf(filePath: string) {
  const { dir, name, ext } = path.parse(filePath);
  return path.join(dir, `${name}${taggedSuffix}${ext}`);
}

/**
 * 組出 exiftool 參數：單一欄位更新 + 原地覆寫旗標 + 目標檔。
 * overwrite 用 `=`，append 用 `+=`。
 */
export function buildExifToolArgs(
  target: string,
  tags: readonly Tag[],
  tagMode: TagMode
) {
  const op = tagMode === "overwrite" ? "=" : "+=";
  return [`-${tagsField}${op}${tags.join(",")}`, "-overwrite_original", target];
}

/**
 * 透過 exiftool 子程序寫入 XMP 關鍵字。
 */
export class MetadataWriterExifTool implements MetadataWriter {
  private readonly runner: CommandRunner;
  private readonly toolCommand: readonly string[];
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(deps: {
    runner: CommandRunner;
    /** 例如 `["exiftool"]`；可帶前置參數 */
    toolCommand: readonly string[];
    timeoutMs: number;
    logger: Logger;
  }) {
    this.runner = deps.runner;
    this.toolCommand = deps.toolCommand;
    this.timeoutMs = deps.timeoutMs;
    this.logger = deps.logger.extend("MetadataWriterExifTool");
  }

  async write(
    filePath: string,
    tags: readonly Tag[],
    options: WriteOptions
  ): Promise<WriteOutcome> {
    const fileName = path.basename(filePath);
    if (tags.length === 0) {
      this.logger.warn({ filePath })`${fileName} 沒有可寫入的標籤`;
      return { success: true, outputPath: filePath };
    }

    let target = filePath;
    if (options.saveMode === "suffix") {
      target = taggedPathOf(filePath);
      try {
        await copyFile(filePath, target);
      } catch (error) {
        this.logger.error({ error, filePath, target })`建立副本失敗: ${target}`;
        return {
          success: false,
          outputPath: filePath,
          error: { type: "COPY_FAILED", message: errorMessage(error) },
        };
      }
    }

    const argv = [
      ...this.toolCommand,
      ...buildExifToolArgs(target, tags, options.tagMode),
    ];
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const runResult = await this.runner.run(argv, { timeoutMs });

    const fail = (
      outcome: Extract<WriteOutcome, { success: false }>
    ): WriteOutcome => {
      if (target !== filePath) {
        // 副本保留在磁碟上，不回報為輸出
        this.logger.warn({ target })`寫入失敗，副本 ${path.basename(target)} 保留未清除`;
      }
      return outcome;
    };

    if (isErr(runResult)) {
      const { error } = runResult;
      this.logger.error({ filePath, error: error.message })`exiftool 執行失敗: ${fileName}`;
      return fail({
        success: false,
        outputPath: filePath,
        error:
          error.type === "TIMEOUT"
            ? { type: "TIMEOUT", message: error.message }
            : {
                type: "EXEC_FAILED",
                message: `Cannot start ${this.toolCommand.join(" ")}: ${error.message}. Install exiftool or set AUTOTAG_EXIFTOOL_PATH`,
              },
      });
    }

    const { exitCode, stderr } = runResult.value;
    if (exitCode !== 0) {
      this.logger.error({ filePath, exitCode, stderr })`exiftool 錯誤: ${stderr.trim()}`;
      return fail({
        success: false,
        outputPath: filePath,
        error: {
          type: "EXIT_CODE",
          message: stderr.trim() || `exiftool exited with code ${exitCode}`,
          exitCode,
        },
      });
    }

    this.logger.info({ target })`已寫入 ${tags.length} 個標籤至 ${path.basename(target)}`;
    return { success: true, outputPath: target };
  }
}
