import type {
  MetadataWriter,
  WriteError,
  WriteOptions,
  WriteOutcome,
} from "@/services/MetadataWriter";
import type { Tag } from "@/types";

export type WriteCall = {
  filePath: string;
  tags: readonly Tag[];
  options: WriteOptions;
};

export class MetadataWriterFake implements MetadataWriter {
  readonly calls: WriteCall[] = [];
  private readonly errors = new Map<string, WriteError>();
  private fallbackError: WriteError | undefined;

  async write(
    filePath: string,
    tags: readonly Tag[],
    options: WriteOptions
  ): Promise<WriteOutcome> {
    this.calls.push({ filePath, tags, options });
    const error = this.errors.get(filePath) ?? this.fallbackError;
    if (error) return { success: false, outputPath: filePath, error };
    return { success: true, outputPath: filePath };
  }

  setError(filePath: string, error: WriteError) {
    this.errors.set(filePath, error);
  }

  /** 所有未個別設定的檔案都以此錯誤失敗 */
  failAll(error: WriteError) {
    this.fallbackError = error;
  }
}
