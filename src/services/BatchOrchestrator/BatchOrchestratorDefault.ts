import { readFile } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";

import { imageExtensions } from "@/constants";
import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { ImageValidator } from "@/services/ImageValidator";
import type { JobParams, JobStatusStore } from "@/services/JobStatus";
import type { MetadataWriter } from "@/services/MetadataWriter";
import type { TaggingPipeline } from "@/services/TaggingPipeline";
import { errorMessage } from "@/utils/helper";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { BatchOrchestrator } from "./BatchOrchestrator";

type FileResult =
  | { success: true; outputPath: string; tagCount: number }
  | { success: false; error: string };

export class BatchOrchestratorDefault implements BatchOrchestrator {
  private readonly scanner: FileSystemScanner;
  private readonly validator: ImageValidator;
  private readonly pipeline: TaggingPipeline;
  private readonly writer: MetadataWriter;
  private readonly store: JobStatusStore;
  private readonly logger: Logger;
  private readonly now: () => number;
  private running: Promise<void> = Promise.resolve();

  constructor(deps: {
    scanner: FileSystemScanner;
    validator: ImageValidator;
    pipeline: TaggingPipeline;
    writer: MetadataWriter;
    store: JobStatusStore;
    logger: Logger;
    /** 毫秒時鐘，用於單檔耗時 */
    now?: () => number;
  }) {
    this.scanner = deps.scanner;
    this.validator = deps.validator;
    this.pipeline = deps.pipeline;
    this.writer = deps.writer;
    this.store = deps.store;
    this.logger = deps.logger.extend("BatchOrchestrator");
    this.now = deps.now ?? (() => performance.now());
  }

  start(params: JobParams) {
    this.store.start(params);
    const job = this.run(params);
    this.running = Promise.all([this.running, job]).then(() => undefined);
  }

  idle() {
    return this.running;
  }

  private async run(params: JobParams) {
    const logger = this.logger.extend("run", { folder: params.path });
    logger.info({ event: "start", recursive: params.recursive })`開始批次處理 ${params.path}`;
    try {
      const scanned = await this.scanner.scan(params.path, {
        recursive: params.recursive,
        allowExts: imageExtensions,
      });
      if (isErr(scanned)) {
        logger.error({ error: scanned.error })`掃描資料夾失敗`;
        this.store.appendError("", scanned.error.message);
        this.store.setPhase("error", `Scan failed: ${scanned.error.message}`);
        return;
      }

      const files = scanned.value;
      this.store.setTotal(files.length);
      if (files.length === 0) {
        logger.info({ event: "done" })`資料夾中沒有影像檔`;
        this.store.setPhase("complete", "No image files found");
        return;
      }

      this.store.setPhase("processing", `Found ${files.length} image files`);
      logger.info({ total: files.length })`找到 ${files.length} 個影像檔`;

      for (const [i, filePath] of files.entries()) {
        await this.processFile(filePath, i + 1, params, logger);
      }

      const { successfulFiles, totalFiles } = this.store.snapshot();
      this.store.setPhase(
        "complete",
        `Processing complete: ${successfulFiles}/${totalFiles} successful`
      );
      logger.info({ event: "done" })`批次完成 ${successfulFiles}/${totalFiles} 成功`;
    } catch (error) {
      logger.error({ error })`批次處理中斷`;
      this.store.appendError("", errorMessage(error));
      this.store.setPhase("error", `Batch aborted: ${errorMessage(error)}`);
    }
  }

  private async processFile(
    filePath: string,
    index: number,
    params: JobParams,
    logger: Logger
  ) {
    const fileName = path.basename(filePath);
    this.store.setCurrent(index, fileName);
    const start = this.now();
    const result = await this.tagFile(filePath, fileName, params);
    const seconds = (this.now() - start) / 1000;

    if (result.success) {
      this.store.recordOutcome(fileName, true, result.outputPath);
      this.store.appendMessage(
        fileName,
        `Tagged with ${result.tagCount} tags in ${seconds.toFixed(2)}s`
      );
      logger.debug({ emoji: "🏷️" })`${fileName} 完成，${result.tagCount} 個標籤`;
    } else {
      this.store.recordOutcome(fileName, false);
      this.store.appendMessage(
        fileName,
        `Failed after ${seconds.toFixed(2)}s: ${result.error}`
      );
      this.store.appendError(fileName, result.error);
      logger.warn({ error: result.error })`${fileName} 處理失敗`;
    }
    this.store.recordTiming(fileName, seconds);
  }

  /** 單檔的失敗邊界，任何例外都轉為失敗結果 */
  private async tagFile(
    filePath: string,
    fileName: string,
    params: JobParams
  ): Promise<FileResult> {
    try {
      const bytes = await readFile(filePath);
      const validated = await this.validator.validate(bytes, fileName);
      if (isErr(validated)) {
        return { success: false, error: validated.error.message };
      }

      const outcome = await this.pipeline.process(filePath);
      if (!outcome.success) {
        return { success: false, error: outcome.error ?? "Processing failed" };
      }

      const written = await this.writer.write(filePath, outcome.tags, {
        tagMode: params.tagMode,
        saveMode: params.saveMode,
      });
      if (!written.success) {
        return { success: false, error: written.error.message };
      }
      return {
        success: true,
        outputPath: written.outputPath,
        tagCount: outcome.tags.length,
      };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
