export * from "./ber-builder.js";
export * from "./simple-builder.js";
