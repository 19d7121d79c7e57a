import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import type { Server } from "node:net";

export type StartedServer = {
  server: Server;
  /** 實際監聽的埠號，指定 0 時由系統分配 */
  port: number;
};

/**
 * 開始監聽，成功後才 resolve；埠號被占用等錯誤以 reject 回報。
 */
export function startServer(
  fetch: Hono["fetch"],
  options: { port: number; hostname: string }
): Promise<StartedServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch, ...options }, (info) => {
      server.off("error", reject);
      resolve({ server, port: info.port });
    });
    server.once("error", reject);
  });
}
