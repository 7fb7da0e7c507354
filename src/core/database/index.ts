export * from "./connection";
export * from "./schema";
export * from "./snapshots";
export * from "./subscribers";
