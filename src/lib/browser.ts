import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import { PageUnavailableError, errorMessage } from "./errors";
import {
  caseStatusSteps,
  causeListSteps,
  causeListUrl,
  type Ask,
  type PageKind,
  type PageSnapshotSource,
} from "./pages";
import type { CauseListSection } from "./types";

/** Installed Chromium-family browsers that Playwright can drive without downloading its own build. */
export type BrowserChannel = "chrome" | "msedge";

export interface BrowserOptions {
  channel: BrowserChannel;
  headless: boolean;
}

interface Session {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

/**
 * Opens the portal in a real browser window and waits while the operator fills
 * the form and solves the CAPTCHA, then reads the rendered page. The browser is
 * started on the first page request and its cookies are reused for PDF downloads.
 */
export class BrowserSnapshotSource implements PageSnapshotSource {
  private session: Promise<Session> | null = null;

  constructor(
    private readonly baseUrl: string,
    private readonly options: BrowserOptions,
    private readonly ask: Ask,
    private readonly print: (line: string) => void = console.log
  ) {}

  async caseStatus(cnr: string | null): Promise<string> {
    const { page } = await this.open(this.baseUrl, "case-status");
    this.print(`\n[Browser] Opened ${this.baseUrl}`);
    caseStatusSteps(cnr).forEach((line) => this.print(line));
    await this.ask("[Terminal] Press ENTER when the case status is visible... ");
    return page.content();
  }

  async causeList(section: CauseListSection): Promise<string> {
    const url = causeListUrl(this.baseUrl);
    const { page } = await this.open(url, "cause-list");
    this.print(`\n[Browser] Opened ${url}. In the browser:`);
    causeListSteps(section).forEach((line) => this.print(line));
    await this.ask("[Terminal] Press ENTER when the cause list is visible... ");
    return page.content();
  }

  async cookieHeader(): Promise<string | null> {
    if (!this.session) return null;
    const { context } = await this.session;
    const cookies = await context.cookies(this.baseUrl);
    return cookies.length > 0 ? cookies.map((c) => `${c.name}=${c.value}`).join("; ") : null;
  }

  async close(): Promise<void> {
    if (!this.session) return;
    const pending = this.session;
    this.session = null;
    // A launch that failed was already reported by the page request that started it.
    const session = await pending.catch(() => null);
    await session?.browser.close();
  }

  private async open(url: string, kind: PageKind): Promise<Session> {
    if (!this.session) this.session = this.launch(kind);
    const session = await this.session;
    try {
      await session.page.goto(url, { waitUntil: "domcontentloaded" });
    } catch (error) {
      throw new PageUnavailableError(`Could not open ${url}: ${errorMessage(error)}`, kind);
    }
    return session;
  }

  private async launch(kind: PageKind): Promise<Session> {
    let browser: Browser;
    try {
      browser = await chromium.launch({ channel: this.options.channel, headless: this.options.headless });
    } catch (error) {
      throw new PageUnavailableError(`Could not start ${this.options.channel}: ${errorMessage(error)}`, kind);
    }
    const context = await browser.newContext();
    const page = await context.newPage();
    return { browser, context, page };
  }
}
