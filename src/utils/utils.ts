/**
 * @file utils.ts
 * @description General utility functions for the cover studio.
 */

/**
 * @function isRecord
 * @description Narrows a parsed JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @function errorMessage
 * @description Message of an Error, or the stringified value for anything else thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
