/**
 * Argument parsers for commander options
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a whole number greater than zero
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}
