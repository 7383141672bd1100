import { describe, it, expect } from "vitest";
import { ProcessedSet, decide } from "./decision";
import { ExistingFileIndex } from "./existing-index";
import type { ResolvedName } from "./naming";

function resolved(filename: string, rowNumber: number, extension: string): ResolvedName {
  return {
    filename,
    rowNumber,
    extension,
    extensionKnown: extension !== "",
    rowKey: `${rowNumber}|${extension.toLowerCase()}`,
  };
}

describe("decide", () => {
  it("transfers a new attachment once per run", () => {
    const index = new ExistingFileIndex();
    const processed = new ProcessedSet();
    const name = resolved("2025-01-15_fuel_1.jpg", 1, ".jpg");

    expect(decide("formA", name, index, processed)).toBe("TRANSFER");
    expect(decide("formA", name, index, processed)).toBe("SKIP_DUPLICATE_IN_RUN");
  });

  it("skips what the destination already holds without claiming it", () => {
    const index = ExistingFileIndex.fromRecords([{ name: "row1_a.jpg", parentPath: "", size: 1 }]);
    const processed = new ProcessedSet();

    expect(decide("formA", resolved("2025-01-15_fuel_1.jpg", 1, ".jpg"), index, processed)).toBe(
      "SKIP_EXISTING"
    );
    expect(processed.size).toBe(0);
  });

  it("collapses attachments of one row that share an extension", () => {
    const index = new ExistingFileIndex();
    const processed = new ProcessedSet();

    expect(decide("formA", resolved("d_t_1-1.jpg", 1, ".jpg"), index, processed)).toBe("TRANSFER");
    expect(decide("formA", resolved("d_t_1-2.JPG", 1, ".JPG"), index, processed)).toBe(
      "SKIP_DUPLICATE_IN_RUN"
    );
    expect(decide("formA", resolved("d_t_1-3.png", 1, ".png"), index, processed)).toBe("TRANSFER");
  });

  it("keeps claims of different forms apart", () => {
    const index = new ExistingFileIndex();
    const processed = new ProcessedSet();
    const name = resolved("row1_photo.jpg", 1, ".jpg");

    expect(decide("formA", name, index, processed)).toBe("TRANSFER");
    expect(decide("formB", name, index, processed)).toBe("TRANSFER");
    expect(processed.size).toBe(4);
  });
});
