export * from "./apply-ups.js";
export * from "./types.js";
export * from "./ups-format.js";
