import { format } from "date-fns";
import kleur from "kleur";

import type {
  LogContext,
  LogFn,
  LogLevel,
  LogRecord,
  LogTransport,
  Logger,
  SerializedError,
  TemplateLog,
} from "./Logger";
import { logLevels } from "./Logger";
import { dispose } from "../utils/Disposeable";

export type EmojiMap = Record<string, string>;

const levelColors: Record<LogLevel, (s: string) => string> = {
  trace: kleur.gray,
  debug: kleur.cyan,
  info: kleur.blue,
  warn: kleur.yellow,
  error: kleur.red,
};

const noopTemplate: TemplateLog = () => {};

export class LoggerConsole implements Logger, AsyncDisposable {
  readonly trace: LogFn;
  readonly debug: LogFn;
  readonly info: LogFn;
  readonly warn: LogFn;
  readonly error: LogFn;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.buildLogFn("trace");
    this.debug = this.buildLogFn("debug");
    this.info = this.buildLogFn("info");
    this.warn = this.buildLogFn("warn");
    this.error = this.buildLogFn("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /**
   * 加入輸出目標。transport 陣列由 extend 出來的子 logger 共用。
   */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    await dispose(...this.transports.splice(0));
  }

  private buildLogFn(level: LogLevel): LogFn {
    return (
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog => {
      if (typeof contextOrMessage === "string") {
        this.emit(level, {}, contextOrMessage);
        return noopTemplate;
      }
      if (message !== undefined) {
        this.emit(level, contextOrMessage ?? {}, message);
        return noopTemplate;
      }
      const context = contextOrMessage ?? {};
      return (strings, ...values) => {
        const templateContext: LogContext = { ...context };
        let colored = strings[0];
        let plain = strings[0];
        values.forEach((value, i) => {
          templateContext[`__${i}`] = value;
          colored += kleur.green(String(value)) + strings[i + 1];
          plain += String(value) + strings[i + 1];
        });
        this.emit(level, templateContext, colored, plain);
      };
    };
  }

  private isEnabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private emit(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    plainMessage: string = message
  ) {
    if (!this.isEnabled(level)) return;

    const { event, emoji: callEmoji, error, ...rest } = callContext;
    const { emoji: inheritedEmoji, ...baseRest } = this.context;
    const emoji =
      callEmoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (level !== "info" ? this.emojiMap[level] : undefined) ??
      inheritedEmoji ??
      this.emojiMap[level] ??
      "";
    const context = { ...baseRest, ...rest };
    const path = this.path.join(":");
    const label = [path, event ?? level].filter(Boolean).join(":");
    const err =
      error !== undefined
        ? serializeError(error)
        : level === "error"
          ? captureCallSite()
          : undefined;

    const contextJson =
      Object.keys(context).length > 0 ? " " + safeStringify(context) : "";
    const line = `${kleur.gray(format(new Date(), "HH:mm:ss"))} ${String(emoji)} ${levelColors[level](label)}: ${message}${contextJson}`;

    if (level === "error") {
      console.error(err?.stack ? `${line}\n${err.stack}` : line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path,
      event,
      msg: plainMessage,
      context,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

/**
 * 沒有附帶 error 的 error 級日誌，補上呼叫端堆疊，去掉 logger 內部的框架。
 */
function captureCallSite(): SerializedError {
  const stack = new Error().stack ?? "";
  const frames = stack
    .split("\n")
    .slice(1)
    .filter((line) => !line.includes("LoggerConsole.ts"));
  return { name: "CallSite", message: "", stack: frames.join("\n") };
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? serializeError(v) : v
    );
  } catch {
    return "[unserializable context]";
  }
}
