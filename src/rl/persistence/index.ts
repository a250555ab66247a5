export * from "./native";
export * from "./portable";
