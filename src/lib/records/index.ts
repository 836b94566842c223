export * from "./errors";
export * from "./schemas";
export * from "./parse";
export * from "./process-steps";
export * from "./workspace";
