import { Value } from "@sinclair/typebox/value";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";

import type { BatchOrchestrator } from "@/services/BatchOrchestrator";
import type { ImageValidator } from "@/services/ImageValidator";
import type { JobStatusStore } from "@/services/JobStatus";
import type { MetadataWriter } from "@/services/MetadataWriter";
import type { TaggingPipeline } from "@/services/TaggingPipeline";
import type { TagMode } from "@/types";
import { errorMessage, isDirectory } from "@/utils/helper";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { buildOpenApiDocument, openApiPath } from "./openapi";
import {
  parseFolderRequest,
  saveModeSchema,
  tagModeSchema,
  toStatusResponse,
} from "./schemas";

export type AppDeps = {
  validator: ImageValidator;
  pipeline: TaggingPipeline;
  writer: MetadataWriter;
  orchestrator: BatchOrchestrator;
  store: JobStatusStore;
  logger: Logger;
  /** 單張上傳的存放位置，處理後保留讓 output_path 有效 */
  uploadDir: string;
  defaultTagMode: TagMode;
};

/** query 優先，其次 form 欄位 */
function pickParam(
  query: string | undefined,
  form: unknown
): string | undefined {
  if (query !== undefined) return query;
  return typeof form === "string" ? form : undefined;
}

export function createApp(deps: AppDeps) {
  const logger = deps.logger.extend("http");
  const app = new Hono();
  const openApiDocument = JSON.stringify(buildOpenApiDocument());

  app.use(cors());

  app.use(async (c, next) => {
    const start = performance.now();
    await next();
    logger.debug({
      method: c.req.method,
      status: c.res.status,
      ms: Math.round(performance.now() - start),
    })`${c.req.method} ${c.req.path}`;
  });

  app.get("/", (c) => c.redirect(openApiPath));
  app.get(openApiPath, (c) =>
    c.body(openApiDocument, 200, {
      "Content-Type": "application/json; charset=UTF-8",
    })
  );
  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/process/image", async (c) => {
    const start = performance.now();
    const body = await c.req.parseBody();
    const file = body["file"];
    if (file === undefined || typeof file === "string" || Array.isArray(file)) {
      return c.json({ success: false, error: "Missing file upload" }, 400);
    }

    const tagMode =
      pickParam(c.req.query("tag_mode"), body["tag_mode"]) ??
      deps.defaultTagMode;
    if (!Value.Check(tagModeSchema, tagMode)) {
      return c.json(
        { success: false, error: `Invalid tag_mode: ${tagMode}` },
        400
      );
    }
    const saveMode =
      pickParam(c.req.query("save_mode"), body["save_mode"]) ?? "replace";
    if (!Value.Check(saveModeSchema, saveMode)) {
      return c.json(
        { success: false, error: `Invalid save_mode: ${saveMode}` },
        400
      );
    }

    const fileName = path.basename(file.name);
    const bytes = new Uint8Array(await file.arrayBuffer());
    const validated = await deps.validator.validate(bytes, fileName);
    if (isErr(validated)) {
      logger.warn({ fileName, error: validated.error })`上傳檔案驗證失敗`;
      return c.json({ success: false, error: validated.error.message }, 400);
    }

    await mkdir(deps.uploadDir, { recursive: true });
    const savedPath = path.join(
      deps.uploadDir,
      `autotag_${randomUUID().slice(0, 8)}_${fileName}`
    );
    await writeFile(savedPath, bytes);

    // 未產生標籤的上傳不保留
    const discard = () => rm(savedPath, { force: true });
    const outcome = await deps.pipeline.process(savedPath).catch(
      async (error: unknown) => {
        await discard();
        throw error;
      }
    );
    if (!outcome.success) {
      await discard();
      return c.json(
        { success: false, error: outcome.error ?? "Processing failed" },
        400
      );
    }

    const written = await deps.writer.write(savedPath, outcome.tags, {
      tagMode,
      saveMode,
    });
    const processingTime = (performance.now() - start) / 1000;
    logger.info({ emoji: "🏷️", tags: outcome.tags })`已標記 ${fileName}`;
    return c.json({
      success: written.success,
      filename: fileName,
      output_path: written.outputPath,
      tags: outcome.tags,
      save_mode: saveMode,
      processing_time: processingTime,
      ...(written.success ? {} : { error: written.error.message }),
    });
  });

  app.post("/process/folder", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      logger.debug({ error })`無法解析 JSON`;
      return c.json({ success: false, error: "Invalid JSON body" }, 400);
    }
    const parsed = parseFolderRequest(body);
    if (isErr(parsed)) {
      return c.json({ success: false, error: parsed.error }, 400);
    }

    const { recursive, save_mode: saveMode } = parsed.value;
    const folder = path.resolve(parsed.value.path);
    if (!(await isDirectory(folder))) {
      return c.json(
        { success: false, error: `Folder not found: ${parsed.value.path}` },
        400
      );
    }

    deps.orchestrator.start({
      path: folder,
      recursive,
      saveMode,
      tagMode: deps.defaultTagMode,
    });
    return c.json({
      success: true,
      message: `Started processing folder: ${folder} (recursive: ${recursive}, save_mode: ${saveMode})`,
      status_endpoint: "/status",
    });
  });

  app.get("/status", (c) => c.json(toStatusResponse(deps.store.snapshot())));

  app.notFound((c) => c.json({ success: false, error: "Not Found" }, 404));

  app.onError((error, c) => {
    logger.error({ error })`處理請求時發生錯誤 ${c.req.method} ${c.req.path}`;
    return c.json({ success: false, error: errorMessage(error) }, 500);
  });

  return app;
}
