export * from "./logger";
export * from "./retry";
export * from "./date";
export * from "./health";
