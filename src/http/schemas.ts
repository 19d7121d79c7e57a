import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { JobStatusSnapshot, StatusMessage } from "@/services/JobStatus";
import { err, ok, type Result } from "~shared/utils/Result";

export const tagModeSchema = t.Union([
  t.Literal("append"),
  t.Literal("overwrite"),
]);

export const saveModeSchema = t.Union([
  t.Literal("replace"),
  t.Literal("suffix"),
]);

export const folderRequestSchema = t.Object({
  path: t.String({ minLength: 1 }),
  recursive: t.Boolean({ default: false }),
  save_mode: t.Union([t.Literal("replace"), t.Literal("suffix")], {
    default: "replace",
  }),
});

export type FolderRequest = Static<typeof folderRequestSchema>;

/** 套用預設值後檢查，錯誤訊息取第一筆 */
export function parseFolderRequest(body: unknown): Result<FolderRequest, string> {
  const withDefaults = Value.Default(folderRequestSchema, Value.Clone(body));
  if (Value.Check(folderRequestSchema, withDefaults)) return ok(withDefaults);
  const first = Value.Errors(folderRequestSchema, withDefaults).First();
  if (!first) return err("Invalid request body");
  return err(`Invalid request body: ${first.path || "/"} ${first.message}`);
}

const statusMessageSchema = t.Object({
  time: t.Number({ description: "epoch 秒" }),
  file: t.String(),
  message: t.String(),
});

const timingSchema = t.Object({ file: t.String(), time: t.Number() });

export const statusResponseSchema = t.Object({
  phase: t.Union([
    t.Literal("idle"),
    t.Literal("scanning"),
    t.Literal("processing"),
    t.Literal("complete"),
    t.Literal("error"),
  ]),
  active: t.Boolean(),
  current_path: t.String(),
  recursive: t.Boolean(),
  tag_mode: tagModeSchema,
  save_mode: saveModeSchema,
  total_files: t.Integer(),
  processed_files: t.Integer(),
  successful_files: t.Integer(),
  failed_files: t.Integer(),
  current_index: t.Integer(),
  current_file: t.String(),
  start_time: t.Number(),
  end_time: t.Number(),
  eta_seconds: t.Number(),
  eta_formatted: t.String(),
  runtime_formatted: t.String(),
  progress_percent: t.Number(),
  recent_status: t.Array(statusMessageSchema),
  errors: t.Array(statusMessageSchema),
  stats: t.Object({
    avg_time_per_image: t.Number(),
    fastest_image: timingSchema,
    slowest_image: timingSchema,
  }),
  output_files: t.Array(t.String()),
});

export type StatusResponse = Static<typeof statusResponseSchema>;

export const imageResponseSchema = t.Object({
  success: t.Boolean(),
  filename: t.String(),
  output_path: t.String(),
  tags: t.Array(t.String()),
  save_mode: saveModeSchema,
  processing_time: t.Number({ description: "秒" }),
  error: t.Optional(t.String()),
});

export const folderResponseSchema = t.Object({
  success: t.Literal(true),
  message: t.String(),
  status_endpoint: t.String(),
});

export const errorResponseSchema = t.Object({
  success: t.Literal(false),
  error: t.String(),
});

function toMessage(m: StatusMessage) {
  return { time: m.time / 1000, file: m.file, message: m.message };
}

/** JobStatus 快照轉為 snake_case 回應，時間以 epoch 秒表示 */
export function toStatusResponse(s: JobStatusSnapshot): StatusResponse {
  return {
    phase: s.phase,
    active: s.active,
    current_path: s.currentPath,
    recursive: s.recursive,
    tag_mode: s.tagMode,
    save_mode: s.saveMode,
    total_files: s.totalFiles,
    processed_files: s.processedFiles,
    successful_files: s.successfulFiles,
    failed_files: s.failedFiles,
    current_index: s.currentIndex,
    current_file: s.currentFile,
    start_time: s.startTime / 1000,
    end_time: s.endTime / 1000,
    eta_seconds: s.etaSeconds,
    eta_formatted: s.etaFormatted,
    runtime_formatted: s.runtimeFormatted,
    progress_percent: s.progressPercent,
    recent_status: s.recentStatus.map(toMessage),
    errors: s.errors.map(toMessage),
    stats: {
      avg_time_per_image: s.stats.avgTimePerImage,
      fastest_image: { ...s.stats.fastestImage },
      slowest_image: { ...s.stats.slowestImage },
    },
    output_files: [...s.outputFiles],
  };
}
