export * from "./product-validator";
