export * from "./commands";
export * from "./polling";
export * from "./telegram";
