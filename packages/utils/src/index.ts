export * from "./common/result.js";
export * from "./encoding/index.js";
export * from "./hash/index.js";
