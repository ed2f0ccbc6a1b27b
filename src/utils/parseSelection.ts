import { AppError } from "../errors.js";

/**
 * Converts a selection like "all" or "1,3,4" into zero-based indices
 * into a list of `count` entries. Numbers are 1-based, as shown in listings.
 *
 * @throws AppError INVALID_SELECTION for non-numeric or out-of-range entries
 */
export function parseSelection(selection: string, count: number): number[] {
  const trimmed = selection.trim();
  if (trimmed.toLowerCase() === "all") {
    return Array.from({ length: count }, (_, i) => i);
  }

  return trimmed.split(",").map((part) => {
    const token = part.trim();
    const value = /^\d+$/.test(token) ? parseInt(token, 10) : NaN;
    if (!(value >= 1 && value <= count)) {
      throw AppError.badRequest("INVALID_SELECTION", `Invalid selection "${token}"`, { count });
    }
    return value - 1;
  });
}
