import { describe, expect, test } from "vitest";

import { type JobParams, JobStatusStore } from "@/services/JobStatus";

const params: JobParams = {
  path: "/photos",
  recursive: true,
  saveMode: "suffix",
  tagMode: "append",
};

function buildStore(startMs = 1_000_000) {
  let now = startMs;
  const store = new JobStatusStore({ now: () => now });
  return {
    store,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("JobStatusStore", () => {
  test("初始為 idle 且非 active", () => {
    const { store } = buildStore();
    const s = store.snapshot();
    expect(s.phase).toBe("idle");
    expect(s.active).toBe(false);
    expect(s.runtimeFormatted).toBe("0s");
    expect(s.etaFormatted).toBe("0s");
  });

  test("start 重設所有欄位並進入 scanning", () => {
    const { store } = buildStore();
    store.start(params);
    store.setTotal(3);
    store.recordOutcome("a.jpg", true, "/photos/a_tagged.jpg");
    store.appendError("b.jpg", "boom");

    store.start({ ...params, path: "/other", saveMode: "replace" });
    const s = store.snapshot();
    expect(s).toMatchObject({
      phase: "scanning",
      active: true,
      currentPath: "/other",
      saveMode: "replace",
      totalFiles: 0,
      processedFiles: 0,
      successfulFiles: 0,
      failedFiles: 0,
      startTime: 1_000_000,
      errors: [],
      outputFiles: [],
    });
  });

  test("processed 恆等於 successful 加 failed，進度同步更新", () => {
    const { store } = buildStore();
    store.start(params);
    store.setTotal(4);
    store.recordOutcome("a.jpg", true, "/photos/a_tagged.jpg");
    store.recordOutcome("b.jpg", false);
    store.recordOutcome("c.jpg", true, "/photos/c_tagged.jpg");

    const s = store.snapshot();
    expect(s.processedFiles).toBe(3);
    expect(s.successfulFiles + s.failedFiles).toBe(s.processedFiles);
    expect(s.progressPercent).toBe(75);
    expect(s.outputFiles).toEqual([
      "/photos/a_tagged.jpg",
      "/photos/c_tagged.jpg",
    ]);
  });

  test("recentStatus 只保留最新 10 筆，errors 不設上限", () => {
    const { store } = buildStore();
    store.start(params);
    for (let i = 1; i <= 13; i++) {
      store.appendMessage(`f${i}.jpg`, `msg ${i}`);
      store.appendError(`f${i}.jpg`, `err ${i}`);
    }
    const s = store.snapshot();
    expect(s.recentStatus).toHaveLength(10);
    expect(s.recentStatus[0]?.file).toBe("f4.jpg");
    expect(s.recentStatus[9]?.message).toBe("msg 13");
    expect(s.errors).toHaveLength(13);
  });

  test("recordTiming 更新平均、最快、最慢與 ETA", () => {
    const { store } = buildStore();
    store.start(params);
    store.setTotal(5);

    store.recordOutcome("a.jpg", true, "/photos/a.jpg");
    store.recordTiming("a.jpg", 2);
    store.recordOutcome("b.jpg", true, "/photos/b.jpg");
    store.recordTiming("b.jpg", 4);
    store.recordOutcome("c.jpg", false);
    store.recordTiming("c.jpg", 3);

    const s = store.snapshot();
    expect(s.stats).toEqual({
      avgTimePerImage: 3,
      fastestImage: { file: "a.jpg", time: 2 },
      slowestImage: { file: "b.jpg", time: 4 },
    });
    // 剩 2 張 × 平均 3 秒
    expect(s.etaSeconds).toBe(6);
    expect(s.etaFormatted).toBe("6s");
  });

  test("runtime 於讀取時計算，結束後固定", () => {
    const { store, advance } = buildStore();
    store.start(params);
    advance(65_000);
    expect(store.snapshot().runtimeFormatted).toBe("1m 5s");

    store.setPhase("complete", "done");
    advance(30_000);
    const s = store.snapshot();
    expect(s.runtimeFormatted).toBe("1m 5s");
    expect(s.active).toBe(false);
    expect(s.endTime).toBe(1_065_000);
  });

  test("setPhase 附帶訊息並在結束時清除目前檔案", () => {
    const { store } = buildStore();
    store.start(params);
    store.setTotal(1);
    store.setPhase("processing", "Found 1 image files");
    store.setCurrent(1, "a.jpg");
    expect(store.snapshot()).toMatchObject({
      phase: "processing",
      currentIndex: 1,
      currentFile: "a.jpg",
    });

    store.setPhase("error", "Batch aborted: disk gone");
    const s = store.snapshot();
    expect(s.currentFile).toBe("");
    expect(s.recentStatus.map((m) => m.message)).toEqual([
      "Found 1 image files",
      "Batch aborted: disk gone",
    ]);
  });

  test("快照凍結且不受之後的更新影響", () => {
    const { store } = buildStore();
    store.start(params);
    store.appendMessage("a.jpg", "first");
    const before = store.snapshot();

    store.appendMessage("b.jpg", "second");
    store.setTotal(9);

    expect(before.recentStatus).toHaveLength(1);
    expect(before.totalFiles).toBe(0);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.recentStatus)).toBe(true);
    expect(Object.isFrozen(before.stats.fastestImage)).toBe(true);
  });
});
