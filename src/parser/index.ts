export * from "./ber-parser.js";
export * from "./simple-parser.js";
