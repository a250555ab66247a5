export * from "./state-extractor";
export * from "./reward";
export * from "./gym-wrapper";
