export * from "./TaggingPipeline";
export * from "./TaggingPipelineDefault";
