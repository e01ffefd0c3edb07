export * from "./diff/index.js";
export * from "./errors/index.js";
export * from "./formats/index.js";
export * from "./patch-applier.js";
export * from "./patch-creator.js";
export * from "./patch-format.js";
export * from "./patch-inspector.js";
