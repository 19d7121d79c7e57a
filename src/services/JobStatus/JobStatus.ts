import type { SaveMode, TagMode } from "@/types";

export type JobPhase = "idle" | "scanning" | "processing" | "complete" | "error";

export type StatusMessage = {
  /** epoch 毫秒 */
  time: number;
  file: string;
  message: string;
};

export type TimingEntry = {
  file: string;
  /** 秒 */
  time: number;
};

export type JobStats = {
  avgTimePerImage: number;
  fastestImage: TimingEntry;
  slowestImage: TimingEntry;
};

export type JobParams = {
  path: string;
  recursive: boolean;
  saveMode: SaveMode;
  tagMode: TagMode;
};

export type JobStatus = {
  phase: JobPhase;
  currentPath: string;
  recursive: boolean;
  tagMode: TagMode;
  saveMode: SaveMode;
  totalFiles: number;
  processedFiles: number;
  successfulFiles: number;
  failedFiles: number;
  /** 1 起算，0 表示尚未開始 */
  currentIndex: number;
  currentFile: string;
  /** epoch 毫秒，閒置時為 0 */
  startTime: number;
  /** 進入 complete / error 的時間，執行中為 0 */
  endTime: number;
  etaSeconds: number;
  progressPercent: number;
  recentStatus: StatusMessage[];
  errors: StatusMessage[];
  stats: JobStats;
  outputFiles: string[];
};

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * 某一時點的狀態副本，凍結且與儲存區不共用參照。
 * `active`、`etaFormatted`、`runtimeFormatted` 於讀取時計算。
 */
export type JobStatusSnapshot = DeepReadonly<
  JobStatus & {
    active: boolean;
    etaFormatted: string;
    runtimeFormatted: string;
  }
>;
