import type { Result } from "~shared/utils/Result";

export type CommandOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandError =
  | { type: "TIMEOUT"; message: string; timeoutMs: number }
  | { type: "SPAWN_FAILED"; message: string };

export interface CommandRunner {
  /**
   * 執行外部程式並等待結束。逾時會終止整個 process group，
   * 回傳時保證子程序已結束。非 0 的結束碼不算錯誤，由呼叫端判斷。
   */
  run(
    argv: readonly string[],
    options: { timeoutMs: number }
  ): Promise<Result<CommandOutput, CommandError>>;
}
