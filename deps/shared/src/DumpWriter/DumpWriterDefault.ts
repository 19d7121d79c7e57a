import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";

/**
 * 將資料以 JSON 格式輸出為報告檔，檔名帶時間戳避免覆蓋。
 */
export class DumpWriterDefault {
  constructor(
    private readonly logger: Logger,
    private readonly outputDir: string = "dist/reports"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const fileName = `${format(new Date(), "yyyyMMdd-HHmmss")}-${name}.json`;
    const filePath = path.join(this.outputDir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump", filePath })`報告已輸出: ${filePath}`;
    return filePath;
  }
}
