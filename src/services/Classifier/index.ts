export * from "./Classifier";
export * from "./ClassifierHttp";
