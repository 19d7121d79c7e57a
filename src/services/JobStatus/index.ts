export * from "./JobStatus";
export * from "./JobStatusStore";
export * from "./formatDuration";
