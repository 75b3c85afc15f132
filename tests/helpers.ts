import { readFileSync } from "fs";
import * as path from "path";
import type { RunInputs } from "../src/lib/types";

export function loadFixture(name: string): string {
  return readFileSync(path.join(__dirname, "fixtures", name), "utf-8");
}

export function makeInputs(overrides: Partial<RunInputs> = {}): RunInputs {
  return {
    cnr: null,
    case_type: null,
    case_number: null,
    year: null,
    today: false,
    tomorrow: false,
    causelist: false,
    section: "Civil",
    download_pdf: false,
    download_causelist: false,
    ...overrides,
  };
}
