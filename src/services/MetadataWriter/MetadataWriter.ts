import type { SaveMode, Tag, TagMode } from "@/types";

export type WriteError =
  | { type: "COPY_FAILED"; message: string }
  | { type: "EXIT_CODE"; message: string; exitCode: number }
  | { type: "TIMEOUT"; message: string }
  | { type: "EXEC_FAILED"; message: string };

export type WriteOutcome =
  | { success: true; outputPath: string }
  /** 失敗時回報原始路徑，即使 suffix 副本已建立 */
  | { success: false; outputPath: string; error: WriteError };

export type WriteOptions = {
  tagMode: TagMode;
  saveMode: SaveMode;
  /** 毫秒，預設使用建構時的設定 */
  timeoutMs?: number;
};

export interface MetadataWriter {
  write(
    filePath: string,
    tags: readonly Tag[],
    options: WriteOptions
  ): Promise<WriteOutcome>;
}
