import {
  type StaticDecode,
  type TObject,
  type TSchema,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const TRUE_VALUES = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "n", "off", ""]);

/**
 * 環境變數布林值，接受 true/false、1/0、yes/no（大小寫不拘）。
 */
export function envBoolean() {
  return t
    .Transform(t.String())
    .Decode((value) => {
      const lower = value.trim().toLowerCase();
      if (TRUE_VALUES.has(lower)) return true;
      if (FALSE_VALUES.has(lower)) return false;
      throw new Error(`無法解析的布林值: ${value}`);
    })
    .Encode((value: boolean) => String(value));
}

/**
 * 環境變數數值，字串會先轉成 number 再檢查範圍。
 */
export function envNumber(options?: {
  default?: number;
  minimum?: number;
  maximum?: number;
}) {
  return t
    .Transform(t.Union([t.String(), t.Number()], { default: options?.default }))
    .Decode((value) => {
      const n = typeof value === "number" ? value : Number(value.trim());
      if (!Number.isFinite(n)) throw new Error(`無法解析的數值: ${value}`);
      if (options?.minimum !== undefined && n < options.minimum)
        throw new Error(`數值 ${n} 小於下限 ${options.minimum}`);
      if (options?.maximum !== undefined && n > options.maximum)
        throw new Error(`數值 ${n} 大於上限 ${options.maximum}`);
      return n;
    })
    .Encode((value: number) => value);
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`設定檢查失敗:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * 以 schema 建立設定讀取函式。每次呼叫都重新讀取來源，
 * 缺值套用預設值，驗證失敗時拋出 ConfigError。
 */
export function buildConfigFactory<T extends TSchema>(
  schema: T,
  source: () => Record<string, unknown>
): () => StaticDecode<T> {
  return () => {
    const raw = Value.Default(schema, Value.Clean(schema, { ...source() }));
    const issues = [...Value.Errors(schema, raw)].map(
      (e) => `${e.path || "/"}: ${e.message}`
    );
    if (issues.length > 0) throw new ConfigError(issues);
    try {
      return Value.Decode(schema, raw);
    } catch (error) {
      throw new ConfigError([
        error instanceof Error ? error.message : String(error),
      ]);
    }
  };
}

export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): () => StaticDecode<T> {
  return buildConfigFactory(schema, () => ({ ...env }));
}
