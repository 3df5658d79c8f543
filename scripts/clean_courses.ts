import { COLUMNS, type DatasetRow } from "./types";

export type CleanReport = {
  removedBlank: number;
  duplicates: string[];
};

function isBlank(v: unknown) {
  return v === undefined || v === null || String(v).trim() === "";
}

/**
 * Drop rows without a course name, then drop repeated names keeping the
 * first occurrence. Order of surviving rows is preserved.
 */
export function cleanCourses(
  rows: DatasetRow[],
  column: string = COLUMNS.courseName
): { rows: DatasetRow[]; report: CleanReport } {
  const named = rows.filter((r) => !isBlank(r[column]));
  const removedBlank = rows.length - named.length;

  if (removedBlank > 0) {
    console.log(`🧹 Removed ${removedBlank} rows with missing ${column} values.`);
  } else {
    console.log("✅ No missing names found.");
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  const out: DatasetRow[] = [];

  for (const r of named) {
    const key = String(r[column]);
    if (seen.has(key)) {
      duplicates.add(key);
      continue;
    }
    seen.add(key);
    out.push({ ...r });
  }

  if (duplicates.size > 0) {
    console.warn("⚠️  --- Duplicate Detection ---");
    console.warn(`   Found ${duplicates.size} duplicate entries.`);
    console.warn(`   These are the duplicate courses: ${[...duplicates].join(", ")}`);
  } else {
    console.log("✅ No duplicate courses in dataset");
  }

  return { rows: out, report: { removedBlank, duplicates: [...duplicates] } };
}
