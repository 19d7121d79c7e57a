import { type ChildProcess, spawn } from "node:child_process";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  CommandError,
  CommandOutput,
  CommandRunner,
} from "./CommandRunner";

const MAX_OUTPUT = 64 * 1024;

export class CommandRunnerSpawn implements CommandRunner {
  run(
    argv: readonly string[],
    options: { timeoutMs: number }
  ): Promise<Result<CommandOutput, CommandError>> {
    const [command, ...args] = argv;
    if (!command) {
      return Promise.resolve(
        err({ type: "SPAWN_FAILED", message: "empty command" })
      );
    }

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;
      const settle = (result: Result<CommandOutput, CommandError>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      // detached: 子程序自成 process group，逾時時可一併終止其衍生程序
      const child = spawn(command, args, {
        detached: process.platform !== "win32",
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        if (stdout.length < MAX_OUTPUT) stdout += chunk;
      });
      child.stderr?.on("data", (chunk: string) => {
        if (stderr.length < MAX_OUTPUT) stderr += chunk;
      });

      const timer = setTimeout(() => {
        timedOut = true;
        killGroup(child);
      }, options.timeoutMs);

      child.once("error", (error) => {
        settle(err({ type: "SPAWN_FAILED", message: error.message }));
      });

      child.once("close", (code, signal) => {
        if (timedOut) {
          settle(
            err({
              type: "TIMEOUT",
              message: `${command} 超過 ${options.timeoutMs}ms 未結束，已終止`,
              timeoutMs: options.timeoutMs,
            })
          );
          return;
        }
        settle(
          ok({
            exitCode: code ?? (signal ? 128 : 1),
            stdout,
            stderr,
          })
        );
      });
    });
  }
}

function killGroup(child: ChildProcess) {
  if (child.pid === undefined) return;
  try {
    if (process.platform === "win32") child.kill("SIGKILL");
    else process.kill(-child.pid, "SIGKILL");
  } catch {
    // group 已不存在時退回只終止子程序本身
    child.kill("SIGKILL");
  }
}
