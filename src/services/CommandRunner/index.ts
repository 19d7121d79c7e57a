export * from "./CommandRunner";
export * from "./CommandRunnerSpawn";
