/**
 * Local Record Store Module
 *
 * JSON-file-backed list of datapoints treated as ground truth for the
 * target goal.
 */

// Interfaces
export * from "./interfaces/IRecordStore.js";

// Implementation
export * from "./impl/JsonRecordStore.js";
