export * from "./application-message";
