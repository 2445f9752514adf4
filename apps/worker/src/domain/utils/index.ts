export * from "./backoff.js";
export * from "./retry.js";
export * from "./work-item-grouping.js";
