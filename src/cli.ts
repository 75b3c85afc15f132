#!/usr/bin/env node
import { BrowserSnapshotSource } from "./lib/browser";
import { parseCliArgs, USAGE, UsageError, type CliOptions } from "./lib/cli-args";
import { loadConfig, type AppConfig } from "./lib/config";
import { openHistoryDb, recordRun } from "./lib/db";
import { sendListingAlert } from "./lib/email";
import { RunFailedError, errorMessage } from "./lib/errors";
import { createLogger, type Logger } from "./lib/logger";
import { saveRunFiles } from "./lib/output";
import { FileSnapshotSource, ManualSnapshotSource, type Ask, type PageSnapshotSource } from "./lib/pages";
import { promptLine } from "./lib/prompt";
import { runCheck } from "./lib/run";
import type { RunResult } from "./lib/types";

export interface MainDeps {
  env: NodeJS.ProcessEnv;
  ask: Ask;
  /** Receives SIGINT while the run is outside a prompt. */
  interrupts: NodeJS.EventEmitter;
  exit: (code: number) => void;
  now?: () => Date;
}

const defaultDeps: MainDeps = {
  env: process.env,
  ask: (question) => promptLine(question),
  interrupts: process,
  exit: (code) => process.exit(code),
};

function isInterrupt(error: unknown): boolean {
  const cause = error instanceof RunFailedError ? error.cause : error;
  return cause instanceof Error && cause.name === "AbortError";
}

async function persist(result: RunResult, config: AppConfig, options: CliOptions, logger: Logger) {
  const saved = await saveRunFiles(result, config.outDir);
  logger.info(`Saved JSON: ${saved.jsonPath}`);
  logger.info(`Saved Text: ${saved.textPath}`);

  if (config.database) {
    const db = openHistoryDb(config.database);
    try {
      const id = await recordRun(db, result);
      logger.debug(`Recorded run #${id}`);
    } catch (error) {
      logger.error("recordRun", error);
    } finally {
      db.close();
    }
  }

  if (options.notify) {
    if (!config.alert) {
      logger.info("Alert email not configured (RESEND_API_KEY and ALERT_EMAIL); skipping --notify.");
    } else {
      try {
        await sendListingAlert(config.alert, result);
      } catch (error) {
        logger.error("sendListingAlert", error);
      }
    }
  }
}

function printOutcome(result: RunResult, logger: Logger) {
  if (result.listing_details) {
    logger.info(`Serial: ${result.listing_details.serial}`);
    logger.info(`Court : ${result.listing_details.court ?? "—"}`);
  } else if (result.is_listed_today || result.is_listed_tomorrow) {
    logger.info("Case appears to be listed by date (based on hearings), but serial/court requires the cause list.");
  } else {
    logger.info("Case not found in the selected cause list / date, or details unavailable.");
  }
  if (result.downloaded_files.length > 0) {
    logger.info(`Downloaded: ${result.downloaded_files.join(", ")}`);
  }
}

function snapshotSource(options: CliOptions, config: AppConfig, ask: Ask): PageSnapshotSource {
  const interactive =
    options.browser === "manual"
      ? new ManualSnapshotSource(config.baseUrl, ask)
      : new BrowserSnapshotSource(config.baseUrl, { channel: options.browser, headless: options.headless }, ask);
  return new FileSnapshotSource({ caseStatus: options.caseStatusHtml, causeList: options.causeListHtml }, interactive);
}

export async function main(argv: string[], overrides: Partial<MainDeps> = {}): Promise<number> {
  const deps: MainDeps = { ...defaultDeps, ...overrides };
  let options: CliOptions;
  let config: AppConfig;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.kind === "help") {
      console.log(USAGE);
      return 0;
    }
    options = parsed.options;
    config = loadConfig(deps.env);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    if (error instanceof UsageError) console.error(`\n${USAGE}`);
    return 2;
  }

  config = {
    ...config,
    outDir: options.outDir ?? config.outDir,
    downloadDir: options.downloadDir ?? config.downloadDir,
  };
  const logger = createLogger(options.verbose);

  const pages = snapshotSource(options, config, deps.ask);
  const onInterrupt = () => {
    logger.info("\nAborted by user.");
    deps.exit(130);
  };
  deps.interrupts.once("SIGINT", onInterrupt);

  try {
    const result = await runCheck(options.inputs, {
      pages,
      logger,
      baseUrl: config.baseUrl,
      downloadDir: config.downloadDir,
      cookie: config.cookie,
      now: deps.now,
    });

    logger.info("\n=== Cause List Check Result ===");
    await persist(result, config, options, logger);
    printOutcome(result, logger);
    return 0;
  } catch (error) {
    if (isInterrupt(error)) {
      logger.info("\nAborted by user.");
      return 130;
    }
    if (error instanceof RunFailedError) {
      try {
        const saved = await saveRunFiles(error.partial, config.outDir);
        logger.info(`Saved partial result: ${saved.jsonPath}`);
      } catch (saveError) {
        logger.error("saveRunFiles", saveError);
      }
    }
    console.error(`\nError: ${errorMessage(error)}`);
    return 1;
  } finally {
    deps.interrupts.off("SIGINT", onInterrupt);
    await pages.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("[main]", error);
      process.exitCode = 1;
    }
  );
}
