export * from "./binary-codec";
export * from "./time-codec";
export * from "./fixed-point";
export * from "./bitmap";
