import { ExifTool } from "exiftool-vendored";

import { exists } from "@/utils/helper";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ExifService, ReadError } from "./ExifService";

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  private readonly exiftool: ExifTool;

  constructor(options?: { taskTimeoutMillis?: number }) {
    this.exiftool = new ExifTool({
      taskTimeoutMillis: options?.taskTimeoutMillis ?? 30_000,
    });
  }

  async readTags(filePath: string): Promise<Result<string[], ReadError>> {
    if (!(await exists(filePath))) {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }
    try {
      const tags = await this.exiftool.read(filePath);
      const value = "TagsList" in tags ? tags.TagsList : undefined;
      return ok(normalizeList(value));
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取中繼資料失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}

function normalizeList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map((v) => String(v));
  return [String(value)];
}
