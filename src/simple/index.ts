export * from "./tag.js";
export * from "./tlv.js";
