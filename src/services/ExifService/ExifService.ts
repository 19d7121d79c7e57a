import type { Result } from "~shared/utils/Result";

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string };

export interface ExifService {
  /**
   * 讀取檔案目前的 XMP 關鍵字清單，沒有時回傳空陣列。
   */
  readTags(filePath: string): Promise<Result<string[], ReadError>>;
}
