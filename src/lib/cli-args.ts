import { parseArgs } from "util";
import { z } from "zod";
import type { BrowserChannel } from "./browser";
import type { RunInputs } from "./types";

export const USAGE = `Usage: cause-list-check (--cnr <CNR> | --case-type <TYPE> --case-number <N> --year <YYYY>) [options]

Checks whether a case is listed on an eCourts cause list. The tool opens the
portal in a browser, you fill the form and solve the CAPTCHA, and it reads the
rendered page. Saved pages can be given instead.

Options:
  --cnr <CNR>                 16-character CNR number
  --case-type <TYPE>          case type, e.g. OS (with --case-number and --year)
  --case-number <N>           case number
  --year <YYYY>               case year
  --today                     check today's listing
  --tomorrow                  check tomorrow's listing
  --causelist                 read the cause list even without --today/--tomorrow
  --section <Civil|Criminal>  cause list section (default Civil)
  --download-pdf              download PDFs linked on the case status page
  --download-causelist        download the cause list PDF when linked
  --browser <name>            chrome, msedge or manual (default chrome); manual
                              asks for the path of a page you saved yourself
  --headless                  run the browser without a window
  --case-status-html <file>   saved case status page (skips the browser)
  --cause-list-html <file>    saved cause list page (skips the browser)
  --out <dir>                 directory for JSON/TXT results
  --downloads <dir>           directory for downloaded PDFs
  --notify                    email an alert when the case is listed
  --verbose                   print progress
  --help                      show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type BrowserChoice = BrowserChannel | "manual";

export interface CliOptions {
  inputs: RunInputs;
  browser: BrowserChoice;
  headless: boolean;
  caseStatusHtml: string | null;
  causeListHtml: string | null;
  outDir: string | null;
  downloadDir: string | null;
  notify: boolean;
  verbose: boolean;
}

export type ParsedCli = { kind: "help" } | { kind: "run"; options: CliOptions };

const optionalText = z
  .string()
  .trim()
  .min(1)
  .optional()
  .transform((v) => v ?? null);

const argsSchema = z
  .object({
    cnr: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9]{16}$/, "--cnr must be 16 letters or digits")
      .transform((v) => v.toUpperCase())
      .optional()
      .transform((v) => v ?? null),
    "case-type": optionalText,
    "case-number": optionalText,
    year: z
      .string()
      .trim()
      .regex(/^\d{4}$/, "--year must be a 4-digit year")
      .optional()
      .transform((v) => v ?? null),
    today: z.boolean().default(false),
    tomorrow: z.boolean().default(false),
    causelist: z.boolean().default(false),
    section: z.enum(["Civil", "Criminal"]).default("Civil"),
    "download-pdf": z.boolean().default(false),
    "download-causelist": z.boolean().default(false),
    browser: z.enum(["chrome", "msedge", "manual"]).default("chrome"),
    headless: z.boolean().default(false),
    "case-status-html": optionalText,
    "cause-list-html": optionalText,
    out: optionalText,
    downloads: optionalText,
    notify: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .superRefine((args, ctx) => {
    if (Boolean(args.cnr) === Boolean(args["case-type"])) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "exactly one of --cnr or --case-type is required" });
    }
    if (args["case-type"] && (!args["case-number"] || !args.year)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "--case-type requires --case-number and --year" });
    }
  });

export function parseCliArgs(argv: string[]): ParsedCli {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        cnr: { type: "string" },
        "case-type": { type: "string" },
        "case-number": { type: "string" },
        year: { type: "string" },
        today: { type: "boolean" },
        tomorrow: { type: "boolean" },
        causelist: { type: "boolean" },
        section: { type: "string" },
        "download-pdf": { type: "boolean" },
        "download-causelist": { type: "boolean" },
        browser: { type: "string" },
        headless: { type: "boolean" },
        "case-status-html": { type: "string" },
        "cause-list-html": { type: "string" },
        out: { type: "string" },
        downloads: { type: "string" },
        notify: { type: "boolean" },
        verbose: { type: "boolean" },
        help: { type: "boolean" },
      },
    }));
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) return { kind: "help" };

  const parsed = argsSchema.safeParse(values);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  const a = parsed.data;

  return {
    kind: "run",
    options: {
      inputs: {
        cnr: a.cnr,
        case_type: a["case-type"],
        case_number: a["case-number"],
        year: a.year,
        today: a.today,
        tomorrow: a.tomorrow,
        causelist: a.causelist,
        section: a.section,
        download_pdf: a["download-pdf"],
        download_causelist: a["download-causelist"],
      },
      browser: a.browser,
      headless: a.headless,
      caseStatusHtml: a["case-status-html"],
      causeListHtml: a["cause-list-html"],
      outDir: a.out,
      downloadDir: a.downloads,
      notify: a.notify,
      verbose: a.verbose,
    },
  };
}
