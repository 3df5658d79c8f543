import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { columnsOf, loadDataset, requireColumns, writeDataset } from "../../scripts/dataset";
import { DatasetError } from "../../scripts/errors";

describe("dataset I/O", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "dataset-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads a CSV with headers, trimming cells and skipping blank lines", async () => {
    const file = path.join(dir, "courses.csv");
    await fs.writeFile(file, "Course Name,Address\n  Hever Castle ,\n\nKnole Park,Seal Hollow Rd\n", "utf8");

    expect(await loadDataset(file)).toEqual([
      { "Course Name": "Hever Castle", Address: "" },
      { "Course Name": "Knole Park", Address: "Seal Hollow Rd" },
    ]);
  });

  it("writes numbers and nulls as CSV cells", async () => {
    const file = path.join(dir, "out", "courses.csv");
    await writeDataset(file, [{ "Course Name": "A", Latitude: 51.5, "Post Code": null }]);

    expect(await fs.readFile(file, "utf8")).toBe("Course Name,Latitude,Post Code\nA,51.5,\n");
  });

  it("rejects a missing file", async () => {
    const file = path.join(dir, "nope.csv");
    await expect(loadDataset(file)).rejects.toThrow(new DatasetError(`File not found at ${file}`));
  });

  it("rejects files that are not CSV", async () => {
    const file = path.join(dir, "courses.xlsx");
    await fs.writeFile(file, "", "utf8");

    await expect(loadDataset(file)).rejects.toBeInstanceOf(DatasetError);
    await expect(loadDataset(file)).rejects.toThrow(`Unsupported file type: .xlsx at ${file}`);
  });
});

describe("requireColumns", () => {
  it("names the first missing column and its line", () => {
    expect(() => requireColumns([{ "Course Name": "A" }], ["Course Name", "Address"])).toThrow(
      "Missing column 'Address' in row 2"
    );
  });

  it("passes when every column is present", () => {
    expect(() => requireColumns([{ "Course Name": "A", Address: "" }], ["Course Name", "Address"])).not.toThrow();
  });
});

describe("columnsOf", () => {
  it("returns the union of keys in first-seen order", () => {
    expect(columnsOf([{ a: 1, b: 2 }, { b: 3, c: 4 }])).toEqual(["a", "b", "c"]);
  });
});
