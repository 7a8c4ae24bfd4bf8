export * from "./types";
export * from "./tag-reader";
