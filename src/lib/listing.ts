import { matchCase } from "./matcher";
import type { CaseOverview, HearingEntry, ListingDecision, ScheduleRow } from "./types";

const IST_OFFSET_MINUTES = 5 * 60 + 30;
const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** DD-MM-YYYY of the IST (UTC+05:30) calendar day, offset by whole days. */
export function dateStringIst(daysFromToday = 0, now: Date = new Date()): string {
  const ist = new Date(now.getTime() + IST_OFFSET_MINUTES * 60 * 1000 + daysFromToday * DAY_MS);
  return `${pad(ist.getUTCDate())}-${pad(ist.getUTCMonth() + 1)}-${pad(ist.getUTCFullYear(), 4)}`;
}

export function isDateInHearings(hearings: readonly HearingEntry[], target: string): boolean {
  return hearings.some((h) => h.date === target);
}

/**
 * Key used to find the case in a cause list: "<type> <number>/<year>" when all
 * three are given, else the case number read from the status page.
 */
export function buildCaseKey(
  caseType: string | null,
  caseNumber: string | null,
  year: string | null,
  overview: CaseOverview | null
): string | null {
  if (caseType && caseNumber && year) {
    return `${caseType} ${caseNumber}/${year}`;
  }
  return overview?.case_number || null;
}

export interface ListingQuery {
  overview: CaseOverview | null;
  rows: readonly ScheduleRow[] | null;
  identifier: string | null;
  wantToday: boolean;
  wantTomorrow: boolean;
  now?: Date;
}

/**
 * Decides whether the case is listed today/tomorrow.
 *
 * A cause-list match sets the requested flags to true without checking any
 * date: rows carry no date column, so the operator is trusted to have picked
 * the right day in the portal. Hearing dates from the status page only fill
 * flags the cause list left unresolved.
 */
export function resolveListing(query: ListingQuery): ListingDecision {
  const { overview, rows, identifier, wantToday, wantTomorrow } = query;
  const decision: ListingDecision = { listed_today: null, listed_tomorrow: null, details: null };

  if (rows && rows.length > 0 && identifier) {
    const matched = matchCase(rows, identifier);
    if (matched) {
      decision.details = {
        serial: matched.serial,
        court: matched.court_info,
        case_text: matched.case_text,
        purpose: matched.purpose,
      };
    }
    if (wantToday) decision.listed_today = matched !== null;
    if (wantTomorrow) decision.listed_tomorrow = matched !== null;
  }

  if (overview && (wantToday || wantTomorrow)) {
    const now = query.now ?? new Date();
    if (wantToday && decision.listed_today === null) {
      decision.listed_today = isDateInHearings(overview.hearings, dateStringIst(0, now));
    }
    if (wantTomorrow && decision.listed_tomorrow === null) {
      decision.listed_tomorrow = isDateInHearings(overview.hearings, dateStringIst(1, now));
    }
  }

  return decision;
}
