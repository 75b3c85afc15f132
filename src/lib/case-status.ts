import { flattenText } from "./text";
import type { CaseOverview, FieldMatch, HearingEntry } from "./types";

// Each field has its own pattern and stage so one heuristic can change
// without touching the others.
const CASE_NUMBER_PATTERN = /(?:Case\s*No\.?|Case\s*Number)\s*[:\-]?\s*([A-Za-z./\-\s]*\d+\/\d{4})/i;
// Label is case-insensitive, the CNR itself must be uppercase.
const CNR_PATTERN = /[Cc][Nn][Rr]\s*[Nn][Oo]\.?\s*[:\-]?\s*([A-Z0-9]{16})/;
const COURT_NAME_PATTERN = /(?:Court\s*Name|Court)\s*[:\-]?\s*([^\n\r]+)/i;
const HEARING_DATE_PATTERN = /\d{2}-\d{2}-\d{4}/g;
const PURPOSE_PATTERN = /(?:Purpose|Stage)\s*[:\-]?\s*([A-Za-z0-9 ,./()_-]{3,60})/i;

const WINDOW_BEFORE = 60;
const WINDOW_AFTER = 80;

function firstGroup(text: string, pattern: RegExp): FieldMatch<string> {
  const match = text.match(pattern);
  const value = match?.[1]?.trim();
  return value ? { found: true, value } : { found: false };
}

export function valueOrNull<T>(field: FieldMatch<T>): T | null {
  return field.found ? field.value : null;
}

export function findCaseNumber(text: string): FieldMatch<string> {
  return firstGroup(text, CASE_NUMBER_PATTERN);
}

export function findCnr(text: string): FieldMatch<string> {
  return firstGroup(text, CNR_PATTERN);
}

export function findCourtName(text: string): FieldMatch<string> {
  return firstGroup(text, COURT_NAME_PATTERN);
}

/**
 * Every DD-MM-YYYY in the text becomes a hearing, in scan order. The purpose is
 * looked up in a window around the date; unrelated dates are kept as well.
 */
export function findHearings(text: string): HearingEntry[] {
  const hearings: HearingEntry[] = [];
  for (const match of text.matchAll(HEARING_DATE_PATTERN)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const window = text.slice(Math.max(start - WINDOW_BEFORE, 0), Math.min(end + WINDOW_AFTER, text.length));
    hearings.push({ date: match[0], purpose: valueOrNull(firstGroup(window, PURPOSE_PATTERN)) });
  }
  return hearings;
}

export function extractCaseOverview(markup: string): CaseOverview {
  const text = flattenText(markup);
  return {
    cnr: valueOrNull(findCnr(text)),
    case_number: valueOrNull(findCaseNumber(text)),
    court_name: valueOrNull(findCourtName(text)),
    hearings: findHearings(text),
  };
}
