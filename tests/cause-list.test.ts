import { describe, expect, it } from "vitest";
import { classifyFirstCell, extractScheduleRows, toScheduleRow } from "../src/lib/cause-list";
import { loadFixture } from "./helpers";

describe("extractScheduleRows", () => {
  const html = loadFixture("cause-list.html");

  it("keeps only rows that start with a serial number", () => {
    expect(extractScheduleRows(html).map((row) => row.serial)).toEqual(["1", "007", "12"]);
  });

  it("recovers case text, purpose and court from the cells", () => {
    const [first, second, third] = extractScheduleRows(html);
    expect(first).toEqual({
      serial: "1",
      case_text: "OS/1234/2023",
      purpose: null,
      court_info: null,
      raw_cells: ["1", "OS/1234/2023", "Ramesh Patil versus Suresh Patil", "A. Kulkarni"],
    });
    expect(second).toEqual({
      serial: "007",
      case_text: "RCA 45/2024",
      purpose: "Next Purpose: Evidence",
      court_info: "Court Hall 2",
      raw_cells: ["007", "RCA 45/2024", "Next Purpose: Evidence", "Court Hall 2"],
    });
    expect(third).toEqual({
      serial: "12",
      case_text: null,
      purpose: null,
      court_info: null,
      raw_cells: ["12", "Misc. Application"],
    });
  });

  it("returns an empty list for a page without tables", () => {
    expect(extractScheduleRows("<html><body><p>No cause list for the selected date</p></body></html>")).toEqual([]);
  });

  it("drops a header row", () => {
    const html = "<table><tr><th>Sr No.</th><th>Case No</th><th>Purpose</th></tr></table>";
    expect(extractScheduleRows(html)).toEqual([]);
  });

  it("gives identical output on repeated runs", () => {
    expect(extractScheduleRows(html)).toEqual(extractScheduleRows(html));
  });
});

describe("toScheduleRow", () => {
  it("keeps leading zeros in the serial", () => {
    expect(toScheduleRow(["007", "ABC/2020", "Hearing"])).toEqual({
      serial: "007",
      case_text: null,
      purpose: null,
      court_info: null,
      raw_cells: ["007", "ABC/2020", "Hearing"],
    });
  });

  it("ignores single-cell rows", () => {
    expect(toScheduleRow(["3"])).toBeNull();
  });

  it("only looks for the case number in cells 2 to 4", () => {
    expect(toScheduleRow(["5", "A", "B", "C", "OS 9/2024"])?.case_text).toBeNull();
  });

  it("takes the first matching cell for each field", () => {
    const row = toScheduleRow(["5", "OS 9/2024", "MCA 3/2023", "For hearing", "Stage: orders", "Family Court"]);
    expect(row?.case_text).toBe("OS 9/2024");
    expect(row?.purpose).toBe("For hearing");
    expect(row?.court_info).toBe("Family Court");
  });

  it("does not treat Courtroom as a court cell", () => {
    expect(toScheduleRow(["5", "Courtroom 4"])?.court_info).toBeNull();
  });
});

describe("classifyFirstCell", () => {
  it.each([
    ["1", { kind: "serial", serial: "1" }],
    ["0042", { kind: "serial", serial: "0042" }],
    ["12345", { kind: "other" }],
    ["Sr. No.", { kind: "header" }],
    ["sr no", { kind: "header" }],
    ["Serial", { kind: "header" }],
    ["1.", { kind: "other" }],
    ["", { kind: "other" }],
  ])("classifies %j", (cell, expected) => {
    expect(classifyFirstCell(cell)).toEqual(expected);
  });
});
