import { collapseWhitespace } from "./text";
import type { ScheduleRow } from "./types";

function normalizeKey(s: string): string {
  return collapseWhitespace(s).toLowerCase();
}

/**
 * First row whose cell text contains the identifier, ignoring case and
 * whitespace differences. Plain substring containment, no ranking.
 */
export function matchCase(rows: readonly ScheduleRow[], identifier: string): ScheduleRow | null {
  const key = normalizeKey(identifier);
  for (const row of rows) {
    if (normalizeKey(row.raw_cells.join(" ")).includes(key)) {
      return row;
    }
  }
  return null;
}
