export * from "./bps/index.js";
export * from "./ips/index.js";
export * from "./ups/index.js";
