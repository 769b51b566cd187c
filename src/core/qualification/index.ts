/**
 * Qualification Module
 *
 * Derives the daily "early meditation" signal from a source goal.
 */

// Interfaces
export * from "./interfaces/IQualification.js";

// Implementation
export * from "./impl/occurrence.js";
export * from "./impl/Qualifier.js";
