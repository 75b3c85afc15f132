import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import type { RunResult } from "./types";

function stamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(
    d.getSeconds()
  )}`;
}

export function summarizeRun(result: RunResult): string {
  const lines = [`Run at (UTC): ${result.task_run_at}`, `Inputs: ${JSON.stringify(result.inputs)}`];
  if (result.case_overview) lines.push(`Case Overview: ${JSON.stringify(result.case_overview)}`);
  if (result.is_listed_today !== null) lines.push(`Listed Today: ${result.is_listed_today}`);
  if (result.is_listed_tomorrow !== null) lines.push(`Listed Tomorrow: ${result.is_listed_tomorrow}`);
  if (result.listing_details) lines.push(`Listing Details: ${JSON.stringify(result.listing_details)}`);
  if (result.cause_list) {
    lines.push(`Cause List: count=${result.cause_list.count} pdf=${result.cause_list.pdf_path}`);
  }
  if (result.downloaded_files.length > 0) {
    lines.push(`Downloaded Files: ${result.downloaded_files.join(", ")}`);
  }
  return lines.join("\n") + "\n";
}

export interface SavedRun {
  jsonPath: string;
  textPath: string;
}

/** Writes result_<stamp>.json and a matching .txt summary. */
export async function saveRunFiles(result: RunResult, outDir: string, now: Date = new Date()): Promise<SavedRun> {
  await mkdir(outDir, { recursive: true });
  const base = path.join(outDir, `result_${stamp(now)}`);
  const saved = { jsonPath: `${base}.json`, textPath: `${base}.txt` };

  await writeFile(saved.jsonPath, JSON.stringify(result, null, 2), "utf-8");
  await writeFile(saved.textPath, summarizeRun(result), "utf-8");
  return saved;
}
