export * from "./bitmap";
