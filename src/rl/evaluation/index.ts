export * from "./metrics";
export * from "./runner";
