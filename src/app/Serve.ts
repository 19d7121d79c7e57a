import type { CAC } from "cac";

import { getAppConfig } from "@/config";
import { createApp } from "@/http/createApp";
import { type StartedServer, startServer } from "@/http/startServer";
import type { Logger } from "~shared/Logger";

import { buildServices } from "./buildServices";

type Options = {
  port?: number;
  host?: string;
};

export function registerServe(cli: CAC, baseLogger: Logger) {
  cli
    .command("serve", "啟動 HTTP 服務")
    .option("--port <port>", "監聽埠號，預設為 AUTOTAG_PORT")
    .option("--host <host>", "監聽位址，預設為 AUTOTAG_HOST")
    .action(async (options: Options) => {
      const logger = baseLogger.extend("serve", { emoji: "🌐" });
      const config = getAppConfig();
      const services = buildServices(config, logger);
      const app = createApp({
        ...services,
        logger,
        uploadDir: config.AUTOTAG_UPLOAD_DIR,
        defaultTagMode: config.AUTOTAG_TAG_MODE,
      });

      const port = Number(options.port ?? config.AUTOTAG_PORT);
      const hostname = options.host ?? config.AUTOTAG_HOST;
      let started: StartedServer;
      try {
        started = await startServer(app.fetch, { port, hostname });
      } catch (error) {
        logger.error({ error })`無法在 ${hostname}:${port} 啟動服務`;
        process.exitCode = 1;
        return;
      }
      const { server } = started;
      logger.info({ event: "start" })`服務啟動於 ${hostname}:${started.port}`;

      await new Promise<void>((resolve) => {
        const shutdown = (signal: NodeJS.Signals) => {
          logger.info({ signal })`收到 ${signal}，開始關閉服務`;
          server.close((error) => {
            if (error) logger.error({ error })`關閉 HTTP 服務失敗`;
            resolve();
          });
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      });

      // 背景批次跑完才結束
      await services.orchestrator.idle();
      logger.info({ event: "done" })`服務已關閉`;
    });
}
