/**
 * Core Module
 *
 * Remote client, record store, reconciliation, qualification, and the
 * sync run that ties them together.
 */

export * from "./errors.js";
export * from "./config/index.js";
export * from "./remote/index.js";
export * from "./store/index.js";
export * from "./reconciliation/index.js";
export * from "./qualification/index.js";
export * from "./sync/index.js";

// Re-export types
export * from "../types/index.js";
