import "dotenv/config";
import path from "node:path";
import { cleanCourses } from "./clean_courses";
import { loadConfig } from "./config";
import { FIELD_COLUMNS } from "./course_schema";
import { columnsOf, loadDataset, requireColumns, writeDataset } from "./dataset";
import { enrichCourseAddresses, mergeEnriched } from "./geocode";
import { COLUMNS } from "./types";
import { validateGolfCourses } from "./validate_courses";
import { withErrorHandling, writeValidationReport } from "./validation";

async function main() {
  const result = await withErrorHandling(async () => {
    const config = loadConfig();

    const rows = await loadDataset(config.inputCsv);
    requireColumns(rows, [COLUMNS.courseName, COLUMNS.address]);

    console.log(`📊 Processing ${rows.length} golf course records from ${config.inputCsv}`);

    const { rows: cleaned, report } = cleanCourses(rows);

    const enriched = await enrichCourseAddresses(cleaned, config.apiKey, {
      throttleThreshold: config.throttleThreshold,
      checkpointPath: config.checkpointPath,
    });
    const merged = mergeEnriched(cleaned, enriched);

    const { valid, errors, results } = validateGolfCourses(merged);

    const validatedCsv = path.join(config.outputDir, "golf_courses_validated.csv");
    const errorsCsv = path.join(config.outputDir, "golf_courses_errors.csv");
    const reportPath = path.join(config.outputDir, "golf_course_validation.json");

    await writeDataset(validatedCsv, valid, Object.keys(FIELD_COLUMNS));
    await writeDataset(errorsCsv, errors, [...columnsOf(merged), "total_errors", "error_details"]);
    await writeValidationReport(reportPath, results, "Golf Course Validation");

    console.log(`\n✅ Wrote ${validatedCsv} (${valid.length} rows)`);
    console.log(`✅ Wrote ${errorsCsv} (${errors.length} rows)`);

    return {
      totalRecords: rows.length,
      removedBlank: report.removedBlank,
      duplicates: report.duplicates.length,
      enriched: enriched === cleaned ? 0 : enriched.length,
      valid: valid.length,
      invalid: errors.length,
    };
  }, "Golf course pipeline");

  if (!result.success) {
    console.error("❌ Pipeline failed with errors:", result.errors);
    process.exit(1);
  }

  console.log("📊 Run summary:", result.data);
}

main().catch((err) => {
  console.error("❌ pipeline crashed:", err);
  process.exit(1);
});
