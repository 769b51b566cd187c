/**
 * Remote Goal Module
 *
 * HTTP client for the Beeminder datapoints API.
 */

// Interfaces
export * from "./interfaces/IGoalClient.js";

// Implementation
export * from "./impl/BeeminderClient.js";
