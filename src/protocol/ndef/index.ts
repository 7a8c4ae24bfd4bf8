export * from "./record";
export * from "./parse-record";
export * from "./write-record";
