/**
 * Reconciliation Module
 *
 * Brings a remote goal in line with the local record store by minimal
 * creates and deletes.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Implementation
export * from "./impl/Reconciler.js";
