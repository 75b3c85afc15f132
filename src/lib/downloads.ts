import * as cheerio from "cheerio";
import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { fetchWithTls } from "./http";
import type { Logger } from "./logger";

export function sanitizeFilename(name: string): string {
  return name.replace(/[^\w\-.]+/g, "_").replace(/^_+|_+$/g, "");
}

/** Absolute, de-duplicated, sorted URLs of every link on the page whose href mentions "pdf". */
export function collectPdfLinks(markup: string, baseUrl: string): string[] {
  const $ = cheerio.load(markup);
  const links = new Set<string>();

  $("a[href]").each((_, a) => {
    const href = $(a).attr("href")?.trim();
    if (!href || !href.toLowerCase().includes("pdf")) return;
    try {
      links.add(new URL(href, baseUrl).toString());
    } catch {
      // not a resolvable URL (e.g. "javascript:" with bad syntax); nothing to download
    }
  });

  return [...links].sort();
}

export async function downloadPdf(url: string, cookie: string | null): Promise<Buffer | null> {
  const { body, statusCode, contentType } = await fetchWithTls(url, cookie ? { Cookie: cookie } : {});
  if (statusCode !== 200 || !contentType.toLowerCase().startsWith("application/pdf")) {
    return null;
  }
  return body;
}

export function pdfFilename(url: string, now: Date = new Date()): string {
  const base = path.posix.basename(new URL(url).pathname);
  return sanitizeFilename(base) || `case_${Math.floor(now.getTime() / 1000)}.pdf`;
}

/** Downloads each link into `dir`; links that fail or are not PDFs are logged and skipped. */
export async function downloadPdfs(
  links: readonly string[],
  dir: string,
  cookie: string | null,
  logger: Logger
): Promise<string[]> {
  const saved: string[] = [];
  if (links.length === 0) return saved;

  await mkdir(dir, { recursive: true });
  for (const url of links) {
    try {
      const pdf = await downloadPdf(url, cookie);
      if (!pdf) {
        logger.debug(`Skipped non-PDF response from ${url}`);
        continue;
      }
      const filePath = path.join(dir, pdfFilename(url));
      await writeFile(filePath, pdf);
      saved.push(filePath);
      logger.debug(`Downloaded PDF: ${filePath}`);
    } catch (error) {
      logger.error("downloadPdfs", error);
    }
  }
  return saved;
}
