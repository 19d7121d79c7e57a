import type {
  ClassificationAspect,
  ClassificationResult,
  PersonCategory,
  Tag,
} from "@/types";

const aspectOrder: readonly ClassificationAspect[] = [
  "scene",
  "roomtype",
  "clothing",
];

/**
 * 依固定順序 scene → roomtype → clothing → people 產生標籤，
 * 只輸出實際存在的項目。信心值不參與判斷，也不去重。
 */
export function synthesizeTags(
  classification: ClassificationResult,
  people?: PersonCategory
): Tag[] {
  const tags: Tag[] = [];
  for (const aspect of aspectOrder) {
    const value = classification[aspect];
    if (value) tags.push(`${aspect}/${value.label}`);
  }
  if (people) tags.push(`people/${people}`);
  return tags;
}
