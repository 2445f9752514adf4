export * from "./buffer.js";
