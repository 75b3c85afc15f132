import { elementText, loadMarkup } from "./text";
import type { ScheduleRow } from "./types";

const SERIAL_PATTERN = /^\d{1,4}$/;
const HEADER_PATTERN = /^(?:sr\.?\s*no\.?|serial)/i;
const CASE_NUMBER_PATTERNS = [/\b\d{1,6}\/\d{4}\b/, /[A-Za-z]{1,10}\s*\d{1,6}\/\d{4}/];
const PURPOSE_PATTERN = /purpose|stage|for hearing|listing/i;
const COURT_PATTERN = /\bCourt\b/i;

export type FirstCell = { kind: "serial"; serial: string } | { kind: "header" } | { kind: "other" };

export function classifyFirstCell(cell: string): FirstCell {
  if (SERIAL_PATTERN.test(cell)) return { kind: "serial", serial: cell };
  if (HEADER_PATTERN.test(cell)) return { kind: "header" };
  return { kind: "other" };
}

function firstCellMatching(cells: string[], test: (cell: string) => boolean): string | null {
  return cells.find(test) ?? null;
}

// Case numbers usually sit in the 2nd or 3rd column, so only cells 2-4 are checked.
function findCaseText(cells: string[]): string | null {
  return firstCellMatching(cells.slice(1, 4), (cell) => CASE_NUMBER_PATTERNS.some((p) => p.test(cell)));
}

export function toScheduleRow(cells: string[]): ScheduleRow | null {
  if (cells.length < 2) return null;
  const first = classifyFirstCell(cells[0]);
  if (first.kind !== "serial") return null;

  return {
    serial: first.serial,
    case_text: findCaseText(cells),
    purpose: firstCellMatching(cells, (cell) => PURPOSE_PATTERN.test(cell)),
    court_info: firstCellMatching(cells, (cell) => COURT_PATTERN.test(cell)),
    raw_cells: cells,
  };
}

/**
 * Reads every table on a cause-list page and keeps the rows that start with a
 * serial number. Header rows and layout rows are dropped.
 */
export function extractScheduleRows(markup: string): ScheduleRow[] {
  const $ = loadMarkup(markup);
  const rows: ScheduleRow[] = [];

  $("table").each((_, table) => {
    $(table)
      .find("tr")
      .each((__, tr) => {
        const cells = $(tr)
          .find("td, th")
          .map((___, cell) => elementText($, cell))
          .get();
        const row = toScheduleRow(cells);
        if (row) rows.push(row);
      });
  });

  return rows;
}
