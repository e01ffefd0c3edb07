export * from "./patch-error.js";
