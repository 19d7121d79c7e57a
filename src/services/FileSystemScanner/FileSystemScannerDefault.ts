import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { type FileSystemScanner, type ScanError } from "./FileSystemScanner";

/**
 * 列出目錄下符合副檔名的檔案，回傳絕對路徑。
 * 順序即檔案系統列舉順序，不排序。
 */
export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: { recursive?: boolean; allowExts?: readonly string[] }
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? false;
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    const absRoot = path.resolve(rootPath);
    try {
      const files = await readdir(absRoot, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          if (!d.isFile()) return false;
          if (allowExts.length === 0) return true;
          const ext = path.extname(d.name).toLowerCase();
          return allowExtsSet.has(ext);
        })
        .map((d) => path.join(d.parentPath, d.name));
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
