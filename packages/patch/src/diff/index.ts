export * from "./binary-differ.js";
export * from "./types.js";
