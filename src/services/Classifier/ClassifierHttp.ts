import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosInstance } from "axios";

import type {
  ClassificationAspect,
  ClassificationResult,
  PersonCategory,
} from "@/types";
import { errorMessage } from "@/utils/helper";
import type { Logger } from "~shared/Logger";

import type { Classifier } from "./Classifier";

const classificationSchema = t.Object({
  label: t.String({ minLength: 1 }),
  confidence: t.Number(),
});

const analyzeResponseSchema = t.Object({
  scene: t.Optional(classificationSchema),
  roomtype: t.Optional(classificationSchema),
  clothing: t.Optional(classificationSchema),
});

const peopleResponseSchema = t.Object({
  boxes: t.Array(
    t.Object({
      label: t.String(),
      height: t.Number(),
    })
  ),
});

const aspects: readonly ClassificationAspect[] = [
  "scene",
  "roomtype",
  "clothing",
];

export function categorizePeople(count: number): PersonCategory {
  if (count <= 0) return "none";
  if (count === 1) return "solo";
  return "group";
}

/**
 * 呼叫推論 sidecar 的分類器。
 *
 * - `POST /analyze` → 場景、房間類型、衣著
 * - `POST /detect/people` → 偵測框，只計算高度達門檻的 person
 */
export class ClassifierHttp implements Classifier {
  private readonly http: AxiosInstance;
  private readonly minPersonHeight: number;
  private readonly logger: Logger;

  constructor(deps: {
    baseUrl: string;
    timeoutMs: number;
    minPersonHeight: number;
    logger: Logger;
  }) {
    this.http = axios.create({
      baseURL: deps.baseUrl,
      timeout: deps.timeoutMs,
    });
    this.minPersonHeight = deps.minPersonHeight;
    this.logger = deps.logger.extend("ClassifierHttp");
  }

  async analyze(imagePath: string): Promise<ClassificationResult> {
    try {
      const res = await this.http.post<unknown>("/analyze", {
        image_path: imagePath,
      });
      const body = Value.Clean(analyzeResponseSchema, res.data);
      if (!Value.Check(analyzeResponseSchema, body)) {
        this.logger.warn({ imagePath })`分類回應格式不符，略過`;
        return {};
      }
      const result: ClassificationResult = {};
      for (const aspect of aspects) {
        const value = body[aspect];
        if (value) result[aspect] = value;
      }
      return result;
    } catch (error) {
      this.logger.warn({ error, imagePath })`場景分類失敗: ${errorMessage(error)}`;
      return {};
    }
  }

  async countPeople(imagePath: string): Promise<PersonCategory> {
    try {
      const res = await this.http.post<unknown>("/detect/people", {
        image_path: imagePath,
      });
      const body = res.data;
      if (!Value.Check(peopleResponseSchema, body)) {
        this.logger.warn({ imagePath })`人物偵測回應格式不符，視為無人`;
        return "none";
      }
      const count = body.boxes.filter(
        (box) => box.label === "person" && box.height >= this.minPersonHeight
      ).length;
      return categorizePeople(count);
    } catch (error) {
      this.logger.warn({ error, imagePath })`人物偵測失敗: ${errorMessage(error)}`;
      return "none";
    }
  }
}
