export { crc32, formatCrc32 } from "./crc32.js";
