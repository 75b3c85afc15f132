import { extractCaseOverview } from "./case-status";
import { extractScheduleRows } from "./cause-list";
import { collectPdfLinks, downloadPdfs } from "./downloads";
import { RunFailedError, errorMessage } from "./errors";
import { buildCaseKey, resolveListing } from "./listing";
import type { Logger } from "./logger";
import type { PageSnapshotSource } from "./pages";
import type { RunInputs, RunResult, ScheduleRow } from "./types";

export interface RunDeps {
  pages: PageSnapshotSource;
  logger: Logger;
  baseUrl: string;
  downloadDir: string;
  cookie: string | null;
  download?: typeof downloadPdfs;
  now?: () => Date;
}

export function emptyResult(inputs: RunInputs, now: Date): RunResult {
  return {
    inputs,
    case_overview: null,
    is_listed_today: null,
    is_listed_tomorrow: null,
    listing_details: null,
    cause_list: null,
    downloaded_files: [],
    task_run_at: now.toISOString(),
  };
}

export function wantsCauseList(inputs: RunInputs): boolean {
  return inputs.causelist || inputs.today || inputs.tomorrow;
}

/**
 * One check: case status page (when a CNR is given), cause list page (when a
 * listing is asked for), then the listing decision. Any failure is rethrown as
 * RunFailedError carrying what was extracted so far.
 */
export async function runCheck(inputs: RunInputs, deps: RunDeps): Promise<RunResult> {
  const { pages, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const download = deps.download ?? downloadPdfs;
  const result = emptyResult(inputs, now());
  // The browser session's cookies go with the PDF requests; the configured cookie is the fallback.
  const cookie = async () => (await pages.cookieHeader()) ?? deps.cookie;

  try {
    if (inputs.cnr) {
      const html = await pages.caseStatus(inputs.cnr);
      result.case_overview = extractCaseOverview(html);
      logger.debug(`Parsed case overview: ${JSON.stringify(result.case_overview)}`);

      if (inputs.download_pdf) {
        const links = collectPdfLinks(html, deps.baseUrl);
        logger.debug(`Found ${links.length} pdf-like links`);
        result.downloaded_files.push(...(await download(links, deps.downloadDir, await cookie(), logger)));
      }
    }

    let rows: ScheduleRow[] = [];
    let causeListPdf: string | null = null;
    if (wantsCauseList(inputs)) {
      const html = await pages.causeList(inputs.section);
      rows = extractScheduleRows(html);
      logger.debug(`Parsed ${rows.length} cause list entries`);

      if (inputs.download_causelist) {
        const links = collectPdfLinks(html, deps.baseUrl);
        const saved = await download(links.slice(0, 1), deps.downloadDir, await cookie(), logger);
        causeListPdf = saved[0] ?? null;
        result.downloaded_files.push(...saved);
      }
    }

    const identifier = buildCaseKey(inputs.case_type, inputs.case_number, inputs.year, result.case_overview);
    const decision = resolveListing({
      overview: result.case_overview,
      rows,
      identifier,
      wantToday: inputs.today,
      wantTomorrow: inputs.tomorrow,
      now: now(),
    });

    result.is_listed_today = decision.listed_today;
    result.is_listed_tomorrow = decision.listed_tomorrow;
    result.listing_details = decision.details;
    if (rows.length > 0) {
      result.cause_list = { count: rows.length, entries: rows, pdf_path: causeListPdf };
    }
    return result;
  } catch (error) {
    throw new RunFailedError(errorMessage(error), result, error);
  }
}
