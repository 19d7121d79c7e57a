import { Type as t } from "@sinclair/typebox";
import os from "node:os";
import path from "node:path";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

export const appConfigSchema = t.Object({
  AUTOTAG_PORT: envNumber({ default: 8000, minimum: 1, maximum: 65535 }),
  AUTOTAG_HOST: t.String({ default: "0.0.0.0" }),
  AUTOTAG_TAG_MODE: t.Union([t.Literal("append"), t.Literal("overwrite")], {
    default: "append",
  }),
  /** 寫入用的 exiftool，預設從 PATH 尋找，主機需自行安裝 */
  AUTOTAG_EXIFTOOL_PATH: t.String({ default: "exiftool", minLength: 1 }),
  /** 秒 */
  AUTOTAG_EXIFTOOL_TIMEOUT: envNumber({ default: 30, minimum: 0.001 }),
  AUTOTAG_CLASSIFIER_URL: t.String({ default: "http://localhost:8001" }),
  /** 秒 */
  AUTOTAG_CLASSIFIER_TIMEOUT: envNumber({ default: 60, minimum: 0.001 }),
  AUTOTAG_MIN_PERSON_HEIGHT: envNumber({ default: 40, minimum: 0 }),
  AUTOTAG_UPLOAD_DIR: t.String({
    default: path.join(os.tmpdir(), "autotag"),
  }),
  AUTOTAG_REPORT_DIR: t.String({ default: "dist/reports" }),
});

export const getAppConfig = buildConfigFactoryEnv(appConfigSchema);

export type AppConfig = ReturnType<typeof getAppConfig>;
