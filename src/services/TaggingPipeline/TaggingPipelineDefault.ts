import path from "node:path";
import { performance } from "node:perf_hooks";

import type { Classifier } from "@/services/Classifier";
import { synthesizeTags } from "@/services/TagSynthesizer";
import type { ProcessingOutcome } from "@/types";
import { errorMessage, exists } from "@/utils/helper";
import type { Logger } from "~shared/Logger";

import type { TaggingPipeline } from "./TaggingPipeline";

export class TaggingPipelineDefault implements TaggingPipeline {
  private readonly classifier: Classifier;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: {
    classifier: Classifier;
    logger: Logger;
    /** 毫秒時鐘 */
    now?: () => number;
  }) {
    this.classifier = deps.classifier;
    this.logger = deps.logger.extend("TaggingPipeline");
    this.now = deps.now ?? (() => performance.now());
  }

  async process(imagePath: string): Promise<ProcessingOutcome> {
    const fileName = path.basename(imagePath);
    if (!(await exists(imagePath))) {
      this.logger.error({ imagePath })`找不到影像檔: ${imagePath}`;
      return {
        success: false,
        tags: [],
        error: "Image file not found",
        elapsed: 0,
      };
    }

    this.logger.debug({ emoji: "🧠" })`分析影像 ${fileName}`;
    const start = this.now();
    try {
      // 分類器為共享資源，依序呼叫
      const classification = await this.classifier.analyze(imagePath);
      const people = await this.classifier.countPeople(imagePath);
      const tags = synthesizeTags(classification, people);
      return {
        success: true,
        tags,
        elapsed: (this.now() - start) / 1000,
      };
    } catch (error) {
      this.logger.error({ error, imagePath })`處理影像失敗: ${fileName}`;
      return {
        success: false,
        tags: [],
        error: errorMessage(error),
        elapsed: (this.now() - start) / 1000,
      };
    }
  }
}
