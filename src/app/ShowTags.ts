import type { CAC } from "cac";
import path from "node:path";

import { getAppConfig } from "@/config";
import { ExifServiceExifTool } from "@/services/ExifService";
import { expandHome } from "@/utils/helper";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

export function registerShowTags(cli: CAC, baseLogger: Logger) {
  cli
    .command("show-tags <file>", "列出影像目前的 TagsList")
    .action(async (file: string) => {
      const logger = baseLogger.extend("show-tags", { emoji: "🔖" });
      const config = getAppConfig();
      const filePath = path.resolve(expandHome(file));

      const exif = new ExifServiceExifTool({
        taskTimeoutMillis: config.AUTOTAG_EXIFTOOL_TIMEOUT * 1000,
      });
      try {
        const read = await exif.readTags(filePath);
        if (isErr(read)) {
          logger.error({ error: read.error })`讀取標籤失敗`;
          process.exitCode = 1;
          return;
        }
        if (read.value.length === 0) {
          logger.info()`${path.basename(filePath)} 沒有標籤`;
          return;
        }
        for (const tag of read.value) console.log(tag);
      } finally {
        await exif[Symbol.asyncDispose]();
      }
    });
}
