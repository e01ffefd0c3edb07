export * from "./crc32/index.js";
