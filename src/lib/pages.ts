import { readFile } from "fs/promises";
import { PageUnavailableError, errorMessage } from "./errors";
import type { CauseListSection } from "./types";

/**
 * Supplies the final rendered markup of a portal page. The operator drives the
 * browser (form entry, CAPTCHA); the checker only ever receives a finished snapshot.
 */
export interface PageSnapshotSource {
  caseStatus(cnr: string | null): Promise<string>;
  causeList(section: CauseListSection): Promise<string>;
  /** Cookie header of the session the pages came from, for PDF downloads. */
  cookieHeader(): Promise<string | null>;
  close(): Promise<void>;
}

export type PageKind = PageUnavailableError["page"];

export type Ask = (question: string) => Promise<string>;

export function causeListUrl(baseUrl: string): string {
  return new URL("?p=cause_list/index", baseUrl).toString();
}

export function caseStatusSteps(cnr: string | null): string[] {
  return [`[Browser] Enter the CNR${cnr ? ` ${cnr}` : ""}, solve the CAPTCHA and click 'Search'.`];
}

export function causeListSteps(section: CauseListSection): string[] {
  return [
    "  1) Select State → District → Court Complex → Court Name",
    "  2) Select the desired 'Cause List Date'",
    `  3) Solve the CAPTCHA and click '${section}'`,
  ];
}

async function readSnapshot(filePath: string, page: PageKind): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new PageUnavailableError(`Could not read ${page} page from ${filePath}: ${errorMessage(error)}`, page);
  }
}

/**
 * Pages saved beforehand and passed on the command line. A page without a file
 * goes to `fallback` when there is one.
 */
export class FileSnapshotSource implements PageSnapshotSource {
  constructor(
    private readonly paths: { caseStatus: string | null; causeList: string | null },
    private readonly fallback: PageSnapshotSource | null = null
  ) {}

  caseStatus(cnr: string | null): Promise<string> {
    if (!this.paths.caseStatus && this.fallback) return this.fallback.caseStatus(cnr);
    return this.read(this.paths.caseStatus, "case-status");
  }

  causeList(section: CauseListSection): Promise<string> {
    if (!this.paths.causeList && this.fallback) return this.fallback.causeList(section);
    return this.read(this.paths.causeList, "cause-list");
  }

  async cookieHeader(): Promise<string | null> {
    return this.fallback ? this.fallback.cookieHeader() : null;
  }

  async close(): Promise<void> {
    await this.fallback?.close();
  }

  private async read(filePath: string | null, page: PageKind): Promise<string> {
    if (!filePath) {
      throw new PageUnavailableError(`No ${page} page was given`, page);
    }
    return readSnapshot(filePath, page);
  }
}

/**
 * Prints the browser steps, then blocks until the operator types the path of
 * the page they saved.
 */
export class ManualSnapshotSource implements PageSnapshotSource {
  constructor(
    private readonly baseUrl: string,
    private readonly ask: Ask,
    private readonly print: (line: string) => void = console.log
  ) {}

  caseStatus(cnr: string | null): Promise<string> {
    this.print(`\n[Browser] Open ${this.baseUrl}`);
    caseStatusSteps(cnr).forEach((line) => this.print(line));
    this.print("[Browser] When the case status is visible, save the page as HTML.");
    return this.collect("case-status");
  }

  causeList(section: CauseListSection): Promise<string> {
    this.print(`\n[Browser] Open ${causeListUrl(this.baseUrl)} and:`);
    causeListSteps(section).forEach((line) => this.print(line));
    this.print("[Browser] When the cause list is visible, save the page as HTML.");
    return this.collect("cause-list");
  }

  async cookieHeader(): Promise<string | null> {
    return null;
  }

  async close(): Promise<void> {}

  private async collect(page: PageKind): Promise<string> {
    const answer = (await this.ask(`[Terminal] Path of the saved ${page} page: `)).trim();
    if (!answer) {
      throw new PageUnavailableError(`No ${page} page was saved`, page);
    }
    return readSnapshot(answer, page);
  }
}
