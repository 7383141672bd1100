import { describe, it, expect } from "vitest";
import { formatFormList, parseSelection, selectByUid } from "./select-forms";
import type { SurveyForm } from "@/lib/source/submissions";

const forms: SurveyForm[] = [
  { uid: "aFuel", name: "Fuel Log", dateCreated: "2024-01-01T00:00:00Z", submissionCount: 4 },
  { uid: "bRepair", name: "Repairs", dateCreated: "2024-02-01T00:00:00Z" },
  { uid: "cTrip", name: "Trips", dateCreated: "2024-03-01T00:00:00Z", submissionCount: 0 },
];

describe("parseSelection", () => {
  it("selects everything for all", () => {
    expect(parseSelection("  ALL ", 3)).toEqual({ ok: true, indices: [0, 1, 2] });
  });

  it("returns 0-based indices in order without repeats", () => {
    expect(parseSelection("3, 1,3,", 3)).toEqual({ ok: true, indices: [2, 0] });
  });

  it("rejects non-numbers", () => {
    expect(parseSelection("1,two", 3)).toEqual({ ok: false, error: '"two" is not a number' });
  });

  it("rejects out-of-range numbers", () => {
    expect(parseSelection("0", 3)).toEqual({ ok: false, error: "0 is out of range (1-3)" });
    expect(parseSelection("4", 3)).toEqual({ ok: false, error: "4 is out of range (1-3)" });
  });

  it("rejects an empty answer", () => {
    expect(parseSelection(" , ", 3)).toEqual({ ok: false, error: 'Enter form numbers or "all"' });
  });
});

describe("selectByUid", () => {
  it("keeps the requested order and reports unknown uids", () => {
    const { selected, missing } = selectByUid(forms, ["cTrip", "nope", "aFuel", "cTrip"]);
    expect(selected.map((f) => f.uid)).toEqual(["cTrip", "aFuel"]);
    expect(missing).toEqual(["nope"]);
  });
});

describe("formatFormList", () => {
  it("numbers forms from 1 and shows known counts", () => {
    expect(formatFormList(forms)).toBe(
      ["1. Fuel Log (aFuel) - 4 submissions", "2. Repairs (bRepair)", "3. Trips (cTrip) - 0 submissions"].join("\n")
    );
  });
});
