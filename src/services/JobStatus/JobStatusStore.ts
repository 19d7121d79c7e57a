import { recentStatusCapacity } from "@/constants";

import type {
  JobParams,
  JobPhase,
  JobStatus,
  JobStatusSnapshot,
} from "./JobStatus";
import { formatDuration } from "./formatDuration";

function initialStatus(): JobStatus {
  return {
    phase: "idle",
    currentPath: "",
    recursive: false,
    tagMode: "append",
    saveMode: "replace",
    totalFiles: 0,
    processedFiles: 0,
    successfulFiles: 0,
    failedFiles: 0,
    currentIndex: 0,
    currentFile: "",
    startTime: 0,
    endTime: 0,
    etaSeconds: 0,
    progressPercent: 0,
    recentStatus: [],
    errors: [],
    stats: {
      avgTimePerImage: 0,
      fastestImage: { file: "", time: 0 },
      slowestImage: { file: "", time: 0 },
    },
    outputFiles: [],
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * 批次工作狀態的唯一持有者。
 *
 * 所有操作都是同步函式，內部不 await，因此在單執行緒事件迴圈下
 * 每個操作即為一個不可分割的臨界區；讀取端透過 snapshot() 取得凍結副本。
 * 一個 process 只有一份，開始新工作會覆蓋前一份。
 */
export class JobStatusStore {
  private status: JobStatus = initialStatus();
  private timedFiles = 0;
  private totalTime = 0;
  private readonly now: () => number;

  constructor(deps?: { now?: () => number }) {
    this.now = deps?.now ?? Date.now;
  }

  start(params: JobParams) {
    this.status = {
      ...initialStatus(),
      phase: "scanning",
      currentPath: params.path,
      recursive: params.recursive,
      tagMode: params.tagMode,
      saveMode: params.saveMode,
      startTime: this.now(),
    };
    this.timedFiles = 0;
    this.totalTime = 0;
  }

  setPhase(phase: JobPhase, message?: string) {
    this.status.phase = phase;
    if (phase === "complete" || phase === "error") {
      this.status.endTime = this.now();
      this.status.currentFile = "";
      if (phase === "complete") this.status.etaSeconds = 0;
    }
    if (message) this.appendMessage("", message);
  }

  /** 掃描結束時呼叫一次 */
  setTotal(total: number) {
    this.status.totalFiles = total;
    this.updateProgress();
  }

  setCurrent(index: number, file: string) {
    this.status.currentIndex = index;
    this.status.currentFile = file;
  }

  /** processed 與 successful/failed 一起遞增，兩者恆等 */
  recordOutcome(file: string, success: boolean, outputPath?: string) {
    this.status.processedFiles += 1;
    if (success) {
      this.status.successfulFiles += 1;
      if (outputPath) this.status.outputFiles.push(outputPath);
    } else {
      this.status.failedFiles += 1;
    }
    this.updateProgress();
  }

  appendMessage(file: string, message: string) {
    const recent = this.status.recentStatus;
    recent.push({ time: this.now(), file, message });
    if (recent.length > recentStatusCapacity) {
      recent.splice(0, recent.length - recentStatusCapacity);
    }
  }

  appendError(file: string, message: string) {
    this.status.errors.push({ time: this.now(), file, message });
  }

  /**
   * 更新平均、最快、最慢耗時，並以 平均 × 剩餘檔數 重算 ETA。
   */
  recordTiming(file: string, seconds: number) {
    const { stats } = this.status;
    this.timedFiles += 1;
    this.totalTime += seconds;
    stats.avgTimePerImage = this.totalTime / this.timedFiles;
    if (this.timedFiles === 1 || seconds < stats.fastestImage.time) {
      stats.fastestImage = { file, time: seconds };
    }
    if (this.timedFiles === 1 || seconds > stats.slowestImage.time) {
      stats.slowestImage = { file, time: seconds };
    }
    const remaining = Math.max(
      0,
      this.status.totalFiles - this.status.processedFiles
    );
    this.status.etaSeconds = stats.avgTimePerImage * remaining;
  }

  snapshot(): JobStatusSnapshot {
    const copy = structuredClone(this.status);
    const { phase, startTime, endTime, etaSeconds } = copy;
    const runtimeMs =
      startTime === 0 ? 0 : (endTime === 0 ? this.now() : endTime) - startTime;
    return deepFreeze({
      ...copy,
      active: phase === "scanning" || phase === "processing",
      etaFormatted: formatDuration(etaSeconds),
      runtimeFormatted: formatDuration(runtimeMs / 1000),
    });
  }

  private updateProgress() {
    const { totalFiles, processedFiles } = this.status;
    this.status.progressPercent =
      totalFiles > 0 ? (processedFiles / totalFiles) * 100 : 0;
  }
}
