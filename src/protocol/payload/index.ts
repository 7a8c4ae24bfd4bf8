export * from "./payload";
export * from "./define-payload";
