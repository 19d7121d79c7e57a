import type { JobParams } from "@/services/JobStatus";

export interface BatchOrchestrator {
  /** 重設狀態並於背景啟動批次，立即返回 */
  start(params: JobParams): void;
  /** 目前批次（若有）結束時 resolve，不會 reject */
  idle(): Promise<void>;
}
