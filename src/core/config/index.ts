/**
 * Configuration Module
 *
 * Explicit run configuration assembled from defaults, the environment,
 * an optional .env file, and CLI overrides.
 */

export * from "./config.js";
