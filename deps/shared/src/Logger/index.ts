import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, type EmojiMap } from "./LoggerConsole";

export const defaultEmojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  error: "❌",
  warn: "⚠️",
  debug: "🐛",
  trace: "🔍",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.String({ default: "logs" }),
  })
);

/**
 * 依環境變數建立根 logger。設定 LOG_FILE 時額外寫入輪替檔案。
 */
export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE, rfs: { path: LOG_DIR } })
    );
  }
  return logger;
}
