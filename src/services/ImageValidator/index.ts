export * from "./ImageValidator";
export * from "./ImageValidatorSharp";
