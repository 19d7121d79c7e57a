import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON Lines 寫入輪替檔案。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
  }

  write(record: LogRecord): void {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
