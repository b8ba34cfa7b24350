export * from "./asset-types.js";
export * from "./catalog.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./gallery.js";
export * from "./logger.js";
export * from "./query-result.js";
export * from "./repository.js";
export * from "./search.js";
export * from "./server.js";
export * from "./storage.js";
export * from "./target-platform.js";
export * from "./types.js";
export * from "./upstream.js";
export * from "./validators.js";
export * from "./versions.js";
