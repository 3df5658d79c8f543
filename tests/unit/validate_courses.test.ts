import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DatasetRow } from "../../scripts/types";
import { formatFieldErrors, validateGolfCourses } from "../../scripts/validate_courses";

const good: DatasetRow = {
  "Course Name": "Le Golf National",
  Country: "France",
  "Country Code": "FRA",
  "Course Type": "18 hole",
  Address: "2 Avenue du Golf, Guyancourt",
  "Post Code": "78280",
  Latitude: "48.754",
  Longitude: "2.075",
  Par: "72",
  "Course Index": "74.1",
  "Slope Rating": "144",
};

const bad: DatasetRow = { ...good, "Course Name": "Bad Course", "Post Code": "7828", Par: "75" };

describe("validateGolfCourses", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("partitions rows into records and error rows", () => {
    const { valid, errors } = validateGolfCourses([good, bad]);

    expect(valid).toEqual([
      {
        course_name: "Le Golf National",
        country: "France",
        country_code: "FRA",
        course_type: "18 hole",
        address: "2 Avenue du Golf, Guyancourt",
        post_code: "78280",
        latitude: 48.754,
        longitude: 2.075,
        par: 72,
        course_index: 74.1,
        slope_rating: 144,
      },
    ]);
    expect(errors).toEqual([
      {
        ...bad,
        total_errors: 2,
        error_details:
          "1) 7828: France postcodes must be exactly 5 digits: 7828.\n" +
          "2) 75: For an 18 Hole course, par must be between 68 and 74. Received: 75",
      },
    ]);
  });

  it("keeps row order within each output", () => {
    const second = { ...good, "Course Name": "Second" };
    const bad2 = { ...bad, "Course Name": "Bad Two" };
    const { valid, errors } = validateGolfCourses([bad, good, bad2, second]);

    expect(valid.map((r) => r.course_name)).toEqual(["Le Golf National", "Second"]);
    expect(errors.map((r) => r["Course Name"])).toEqual(["Bad Course", "Bad Two"]);
  });

  it("reports per-row results for the JSON report", () => {
    const { results } = validateGolfCourses([{ ...good, Confidence: "Low" }, bad]);

    expect(results[0]).toEqual({ isValid: true, errors: [], warnings: ["Low geocoding confidence"] });
    expect(results[1]).toEqual({
      isValid: false,
      errors: [
        "post_code: France postcodes must be exactly 5 digits: 7828",
        "par: For an 18 Hole course, par must be between 68 and 74. Received: 75",
      ],
      warnings: [],
      metrics: { course_name: "Bad Course" },
    });
  });

  it("summarizes failures with plural wording", () => {
    validateGolfCourses([good, bad]);

    expect(console.log).toHaveBeenCalledWith("✅ 1 / 2 records have passed validation checks.");
    expect(console.log).toHaveBeenCalledWith(
      "🚨 2 inputs have failed validation of the golf course requirements. Please investigate further."
    );
  });

  it("uses singular wording for a single failed input", () => {
    validateGolfCourses([{ ...good, Par: "80" }]);

    expect(console.log).toHaveBeenCalledWith("✅ 0 / 1 records have passed validation checks.");
    expect(console.log).toHaveBeenCalledWith(
      "🚨 1 input has failed validation of the golf course requirements. Please investigate further."
    );
  });

  it("reports success when nothing fails", () => {
    const { errors } = validateGolfCourses([good]);

    expect(errors).toEqual([]);
    expect(console.log).toHaveBeenCalledWith("✅ All rows passed validation successfully of golf course datasets.");
  });
});

describe("formatFieldErrors", () => {
  it("names the column of a missing value", () => {
    expect(
      formatFieldErrors([
        { field: "address", input: "", message: "Field required" },
        { field: "par", input: 80, message: "Too high" },
      ])
    ).toBe("1) Address: Field required.\n2) 80: Too high");
  });
});
