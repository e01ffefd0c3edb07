export * from "./apply-ips.js";
export * from "./ips-builder.js";
export * from "./ips-format.js";
export * from "./types.js";
