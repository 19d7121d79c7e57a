import type { ClassificationResult, PersonCategory } from "@/types";

/**
 * 影像分類能力。實作不得拋出例外：推論失敗時分別退回 `{}` 與 `"none"`。
 * 實作為共享、有狀態的資源，呼叫端不應對同一實例並行呼叫。
 */
export interface Classifier {
  analyze(imagePath: string): Promise<ClassificationResult>;
  countPeople(imagePath: string): Promise<PersonCategory>;
}
