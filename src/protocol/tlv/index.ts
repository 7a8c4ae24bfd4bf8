export * from "./tlv";
export * from "./tlv-scanner";
export * from "./tlv-writer";
