import type { ProcessingOutcome } from "@/types";

export interface TaggingPipeline {
  /**
   * 對單一影像執行分類與標籤合成，不寫入檔案。
   */
  process(imagePath: string): Promise<ProcessingOutcome>;
}
