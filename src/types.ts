/** `類別/值`，例如 `scene/indoor` */
export type Tag = `${string}/${string}`;

export type TagMode = "append" | "overwrite";

export type SaveMode = "replace" | "suffix";

export type ClassificationAspect = "scene" | "roomtype" | "clothing";

export type Classification = {
  label: string;
  confidence: number;
};

export type ClassificationResult = Partial<
  Record<ClassificationAspect, Classification>
>;

export type PersonCategory = "none" | "solo" | "group";

export type ProcessingOutcome = {
  success: boolean;
  tags: Tag[];
  error?: string;
  /** 秒 */
  elapsed: number;
};
