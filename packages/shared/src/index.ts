export * from "./errors.js";
export * from "./protocol.js";
export * from "./text.js";
