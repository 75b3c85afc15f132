export type FieldMatch<T> = { found: true; value: T } | { found: false };

export interface HearingEntry {
  date: string;
  purpose: string | null;
}

export interface CaseOverview {
  cnr: string | null;
  case_number: string | null;
  court_name: string | null;
  hearings: HearingEntry[];
}

export interface ScheduleRow {
  serial: string;
  case_text: string | null;
  purpose: string | null;
  court_info: string | null;
  raw_cells: string[];
}

export interface ListingDetails {
  serial: string;
  court: string | null;
  case_text: string | null;
  purpose: string | null;
}

export interface ListingDecision {
  listed_today: boolean | null;
  listed_tomorrow: boolean | null;
  details: ListingDetails | null;
}

export type CauseListSection = "Civil" | "Criminal";

export interface RunInputs {
  cnr: string | null;
  case_type: string | null;
  case_number: string | null;
  year: string | null;
  today: boolean;
  tomorrow: boolean;
  causelist: boolean;
  section: CauseListSection;
  download_pdf: boolean;
  download_causelist: boolean;
}

export interface CauseListSnapshot {
  count: number;
  entries: ScheduleRow[];
  pdf_path: string | null;
}

export interface RunResult {
  inputs: RunInputs;
  case_overview: CaseOverview | null;
  is_listed_today: boolean | null;
  is_listed_tomorrow: boolean | null;
  listing_details: ListingDetails | null;
  cause_list: CauseListSnapshot | null;
  downloaded_files: string[];
  task_run_at: string;
}
