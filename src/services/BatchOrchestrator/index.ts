export * from "./BatchOrchestrator";
export * from "./BatchOrchestratorDefault";
