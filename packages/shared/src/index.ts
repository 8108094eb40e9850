export * from "./freeze";
export * from "./errors";
export * from "./validation";
