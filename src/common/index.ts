export * from "./codecs.js";
export * from "./errors.js";
export * from "./reader.js";
export * from "./types.js";
