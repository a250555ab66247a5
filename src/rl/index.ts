/**
 * Shop-floor Worker Assignment RL
 *
 * Discrete-event facility simulator, tabular Q-learning agent, baselines,
 * value-table persistence and the training/evaluation loop.
 */

// Core types
export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./random";
export * from "./settings";

// Environment components
export * from "./environment";

// Learning algorithms
export * from "./learners";

// Value-table files
export * from "./persistence";

// Evaluation and metrics
export * from "./evaluation";
