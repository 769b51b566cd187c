/**
 * Runtime Validation Schemas
 *
 * Zod schemas for data crossing a process boundary: API responses and the
 * local record file.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Datapoint Schemas
// =============================================================================

/**
 * A datapoint as kept in the local record file
 */
export const DatapointSchema = z.object({
  value: z.number().finite(),
  /** Unix seconds */
  timestamp: z.number().int(),
  comment: z.string().default(""),
  id: z.string().optional(),
});

/**
 * A datapoint as returned by the remote API. Unknown fields
 * (daystamp, updated_at, requestid, ...) are stripped.
 */
export const RemoteDatapointSchema = DatapointSchema.extend({
  id: z.string().min(1),
  fulltext: z.string().optional(),
});

/**
 * One page of `GET .../datapoints.json`
 */
export const DatapointPageSchema = z.array(RemoteDatapointSchema);

// =============================================================================
// Local Record File Schema
// =============================================================================

/**
 * Record file contents. Fields a datapoint carries beyond the known ones
 * are kept so that a save writes them back.
 */
export const StoreFileSchema = z.object({
  datapoints: z.array(DatapointSchema.passthrough()),
  last_updated: z.string().datetime({ offset: true }),
});

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Format zod issues into one line per issue, prefixed by the failing path
 */
export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
