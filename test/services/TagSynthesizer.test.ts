import { describe, expect, test } from "vitest";

import { synthesizeTags } from "@/services/TagSynthesizer";

describe("synthesizeTags", () => {
  test("依 scene、roomtype、clothing、people 順序輸出", () => {
    const tags = synthesizeTags(
      {
        clothing: { label: "casual", confidence: 0.4 },
        scene: { label: "indoor", confidence: 0.9 },
        roomtype: { label: "kitchen", confidence: 0.7 },
      },
      "group"
    );
    expect(tags).toEqual([
      "scene/indoor",
      "roomtype/kitchen",
      "clothing/casual",
      "people/group",
    ]);
  });

  test("缺少的項目不輸出，低信心值照樣輸出", () => {
    const tags = synthesizeTags(
      { roomtype: { label: "bedroom", confidence: 0.01 } },
      "none"
    );
    expect(tags).toEqual(["roomtype/bedroom", "people/none"]);
  });

  test("沒有人物類別時不輸出 people 標籤", () => {
    expect(synthesizeTags({})).toEqual([]);
    expect(
      synthesizeTags({ scene: { label: "outdoor", confidence: 1 } })
    ).toEqual(["scene/outdoor"]);
  });

  test("相同標籤不去重", () => {
    const tags = synthesizeTags({
      scene: { label: "x", confidence: 1 },
      roomtype: { label: "x", confidence: 1 },
    });
    expect(tags).toEqual(["scene/x", "roomtype/x"]);
  });
});
