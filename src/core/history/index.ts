export * from "./ring";
export * from "./store";
