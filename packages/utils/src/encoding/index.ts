export * from "./byte-order.js";
export * from "./varint.js";
