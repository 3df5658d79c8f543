import { FIELD_COLUMNS, parseCourseRecord, type CourseRecord, type FieldError } from "./course_schema";
import { COLUMNS, type Cell, type DatasetRow } from "./types";
import type { ValidationResult } from "./validation";

export type ErrorRow = DatasetRow & {
  total_errors: number;
  error_details: string;
};

export type CourseValidation = {
  valid: CourseRecord[];
  errors: ErrorRow[];
  results: ValidationResult[];
};

function describeInput(e: FieldError) {
  const missing = e.input === undefined || e.input === null || (typeof e.input === "string" && e.input.trim() === "");
  // A missing value is shown by its column name
  return missing ? FIELD_COLUMNS[e.field] : String(e.input);
}

/** "1) value: message.\n2) value: message" */
export function formatFieldErrors(errors: FieldError[]): string {
  return errors.map((e, i) => `${i + 1}) ${describeInput(e)}: ${e.message}`).join(".\n");
}

function warningsFor(row: DatasetRow): string[] {
  const confidence: Cell | undefined = row[COLUMNS.confidence];
  return confidence === "Low" ? ["Low geocoding confidence"] : [];
}

/**
 * Split rows into schema-valid course records and an error table carrying
 * the original row plus numbered diagnostics. Never throws on bad rows.
 */
export function validateGolfCourses(rows: DatasetRow[]): CourseValidation {
  const valid: CourseRecord[] = [];
  const errors: ErrorRow[] = [];
  const results: ValidationResult[] = [];

  for (const row of rows) {
    const parsed = parseCourseRecord(row);

    if (parsed.success) {
      valid.push(parsed.record);
      results.push({ isValid: true, errors: [], warnings: warningsFor(row) });
      continue;
    }

    const messages = parsed.errors.map((e) => `${e.field}: ${e.message}`);
    errors.push({
      ...row,
      total_errors: parsed.errors.length,
      error_details: formatFieldErrors(parsed.errors),
    });
    results.push({
      isValid: false,
      errors: messages,
      warnings: warningsFor(row),
      metrics: { course_name: row[COLUMNS.courseName] ?? null },
    });
  }

  const totalErrors = errors.reduce((sum, r) => sum + r.total_errors, 0);

  if (totalErrors > 0) {
    const label = totalErrors === 1 ? "input has" : "inputs have";
    console.log(`✅ ${valid.length} / ${rows.length} records have passed validation checks.`);
    console.log(
      `🚨 ${totalErrors} ${label} failed validation of the golf course requirements. Please investigate further.`
    );
  } else {
    console.log("✅ All rows passed validation successfully of golf course datasets.");
  }

  return { valid, errors, results };
}
