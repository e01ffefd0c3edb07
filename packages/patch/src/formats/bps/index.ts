export * from "./apply-bps.js";
export * from "./bps-builder.js";
export * from "./bps-format.js";
export * from "./types.js";
