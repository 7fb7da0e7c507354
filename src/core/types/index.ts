export * from "./product";
export * from "./sizes";
export * from "./snapshot";
export * from "./database";
