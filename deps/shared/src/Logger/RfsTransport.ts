import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON Lines 寫入輪替檔案。
 * 記錄檔無法寫入時只在 console 回報一次，不中斷執行。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private failure: Error | undefined;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
    this.stream.on("error", (error: Error) => {
      if (this.failure) return;
      this.failure = error;
      console.error(`❌ 記錄檔寫入失敗，停止寫入檔案：${error.message}`);
    });
  }

  get error() {
    return this.failure;
  }

  write(record: LogRecord) {
    if (this.failure || this.stream.destroyed) return;
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    if (this.failure || this.stream.destroyed) return;
    await new Promise<void>((resolve) => {
      this.stream.once("finish", resolve);
      // 錯誤已由建構時的 listener 回報
      this.stream.once("error", () => resolve());
      this.stream.end();
    });
  }
}
