export * from "./context";
export * from "./delivery";
export * from "./queue";
export * from "./refresh-service";
