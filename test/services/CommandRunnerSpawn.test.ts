import { describe, expect, test } from "vitest";

import { CommandRunnerSpawn } from "@/services/CommandRunner";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

const runner = new CommandRunnerSpawn();
const node = process.execPath;

describe("CommandRunnerSpawn", () => {
  test("收集 stdout、stderr 與結束碼", async () => {
    const result = await runner.run(
      [
        node,
        "-e",
        "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
      ],
      { timeoutMs: 10_000 }
    );
    expectOk(result);
    expect(result.value).toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
  });

  test("逾時時終止子程序並回傳 TIMEOUT", async () => {
    const start = Date.now();
    const result = await runner.run(
      [node, "-e", "setTimeout(() => {}, 60000)"],
      { timeoutMs: 300 }
    );
    expectErr(result);
    expect(result.error.type).toBe("TIMEOUT");
    expect(Date.now() - start).toBeLessThan(10_000);
  });

  test("找不到執行檔時回傳 SPAWN_FAILED", async () => {
    const result = await runner.run(["/nonexistent/autotag-tool"], {
      timeoutMs: 1_000,
    });
    expectErr(result);
    expect(result.error.type).toBe("SPAWN_FAILED");
  });

  test("空命令不啟動程序", async () => {
    const result = await runner.run([], { timeoutMs: 1_000 });
    expectErr(result);
    expect(result.error).toEqual({
      type: "SPAWN_FAILED",
      message: "empty command",
    });
  });
});
