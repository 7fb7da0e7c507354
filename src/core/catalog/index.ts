export * from "./fetcher";
export * from "./normalize";
