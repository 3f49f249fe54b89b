/**
 * @collection-kit/collections - Pure helpers for arrays, maps and sets
 */

// re-export everything for full access
export * from "./array-utils.mjs";
export * from "./config.mjs";
export * from "./errors.mjs";
export * from "./logger.mjs";
export * from "./map-utils.mjs";
export * from "./result.mjs";
export * from "./set-utils.mjs";
