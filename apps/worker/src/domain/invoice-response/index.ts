export * from "./interpret.js";
