export * from "./length.js";
export * from "./tag.js";
export * from "./tlv.js";
export * from "./value.js";
