import { type LogLevel, LoggerConsole, defaultEmojiMap } from "../Logger";

/**
 * 測試用 logger，預設只輸出 error，可用 TEST_LOG_LEVEL 調整。
 */
export function buildTestLogger(level?: LogLevel): LoggerConsole {
  const envLevel = process.env.TEST_LOG_LEVEL;
  const resolved =
    level ??
    (envLevel === "trace" ||
    envLevel === "debug" ||
    envLevel === "info" ||
    envLevel === "warn"
      ? envLevel
      : "error");
  return new LoggerConsole(resolved, ["test"], {}, defaultEmojiMap);
}
