import { EventEmitter } from "events";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";

const mocks = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock("playwright-core", () => ({ chromium: { launch: mocks.launch } }));

import { main, type MainDeps } from "../src/cli";
import { USAGE } from "../src/lib/cli-args";

const FIXTURES = path.join(__dirname, "fixtures");
const NOW = new Date("2025-03-05T06:00:00Z");

function deps(overrides: Partial<MainDeps> = {}): Partial<MainDeps> {
  return {
    env: {},
    ask: vi.fn(async () => ""),
    interrupts: new EventEmitter(),
    exit: vi.fn(),
    now: () => NOW,
    ...overrides,
  };
}

describe("main", () => {
  let outDir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  const logged = () => log.mock.calls.map((call) => call[0]);

  async function savedJson(): Promise<unknown[]> {
    const files = (await readdir(outDir)).filter((f) => f.endsWith(".json"));
    return Promise.all(files.map(async (f) => JSON.parse(await readFile(path.join(outDir, f), "utf-8"))));
  }

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(os.tmpdir(), "cause-list-cli-"));
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(outDir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    expect(await main(["--help"], deps())).toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it("exits with 2 on a usage error", async () => {
    expect(await main([], deps())).toBe(2);
    expect(error).toHaveBeenNthCalledWith(1, "Error: exactly one of --cnr or --case-type is required");
  });

  it("exits with 2 on a bad configuration", async () => {
    const code = await main(["--cnr", "MHAU010012342023"], deps({ env: { ECOURTS_BASE_URL: "not a url" } }));
    expect(code).toBe(2);
    expect(error).toHaveBeenCalledWith("Error: Invalid configuration: ECOURTS_BASE_URL Invalid url");
  });

  it("prints the serial and court of a matched row and saves the result", async () => {
    const code = await main(
      [
        "--case-type", "RCA", "--case-number", "45", "--year", "2024", "--today",
        "--cause-list-html", path.join(FIXTURES, "cause-list.html"),
        "--out", outDir,
      ],
      deps()
    );

    expect(code).toBe(0);
    expect(logged()).toContain("Serial: 007");
    expect(logged()).toContain("Court : Court Hall 2");
    expect(mocks.launch).not.toHaveBeenCalled();
    expect(await savedJson()).toEqual([
      expect.objectContaining({
        is_listed_today: true,
        listing_details: expect.objectContaining({ serial: "007", court: "Court Hall 2" }),
      }),
    ]);
  });

  it("says when the case is not on the cause list", async () => {
    const code = await main(
      [
        "--case-type", "RCA", "--case-number", "999", "--year", "2024", "--today",
        "--cause-list-html", path.join(FIXTURES, "cause-list.html"),
        "--out", outDir,
      ],
      deps()
    );
    expect(code).toBe(0);
    expect(logged()).toContain("Case not found in the selected cause list / date, or details unavailable.");
  });

  it("says when only a hearing date shows the listing", async () => {
    const emptyList = path.join(outDir, "empty-list.html");
    await writeFile(emptyList, "<html><body><p>No matters listed</p></body></html>", "utf-8");

    const code = await main(
      [
        "--cnr", "MHAU010012342023", "--today",
        "--case-status-html", path.join(FIXTURES, "case-status.html"),
        "--cause-list-html", emptyList,
        "--out", outDir,
      ],
      deps()
    );
    expect(code).toBe(0);
    expect(logged()).toContain(
      "Case appears to be listed by date (based on hearings), but serial/court requires the cause list."
    );
  });

  it("exits with 1 and keeps the partial result when a page is missing", async () => {
    const code = await main(
      [
        "--cnr", "MHAU010012342023", "--today",
        "--case-status-html", path.join(FIXTURES, "case-status.html"),
        "--cause-list-html", path.join(outDir, "missing.html"),
        "--out", outDir,
      ],
      deps()
    );

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/^\nError: Could not read cause-list page from /));
    expect(await savedJson()).toEqual([
      expect.objectContaining({
        case_overview: expect.objectContaining({ cnr: "MHAU010012342023" }),
        is_listed_today: null,
      }),
    ]);
  });

  it("exits with 130 when the prompt is interrupted", async () => {
    const ask = vi.fn(async (): Promise<string> => {
      throw Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
    });

    const code = await main(["--cnr", "MHAU010012342023", "--browser", "manual", "--out", outDir], deps({ ask }));

    expect(code).toBe(130);
    expect(logged()).toContain("\nAborted by user.");
    expect(await savedJson()).toEqual([]);
  });

  it("exits with 130 on Ctrl+C outside the prompt", async () => {
    const interrupts = new EventEmitter();
    const exit = vi.fn();
    const ask = vi.fn(async () => {
      interrupts.emit("SIGINT");
      return path.join(FIXTURES, "case-status.html");
    });

    await main(["--cnr", "MHAU010012342023", "--browser", "manual", "--out", outDir], deps({ ask, interrupts, exit }));

    expect(exit).toHaveBeenCalledWith(130);
    expect(logged()).toContain("\nAborted by user.");
    expect(interrupts.listenerCount("SIGINT")).toBe(0);
  });
});
