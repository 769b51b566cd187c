/**
 * Sync Module
 */

export * from "./sync.js";
