export * from "./base";
export * from "./schedules";
export * from "./qlearning";
export * from "./baselines";
export * from "./factory";
