export * from "./time-codec";
