export * from "./binary-codec";
