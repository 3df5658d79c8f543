import "dotenv/config";
import { promises as fs } from "node:fs";
import path from "node:path";
import { envSchema } from "./config";
import { loadDataset } from "./dataset";
import { needsEnrichment } from "./geocode";
import { COLUMNS, type DatasetRow } from "./types";
import { withErrorHandling } from "./validation";

async function readRowsIfExists(p: string): Promise<DatasetRow[] | null> {
  try {
    await fs.access(p);
  } catch {
    return null;
  }
  return loadDataset(p);
}

function namesOf(rows: DatasetRow[]) {
  return rows.map((r) => String(r[COLUMNS.courseName] ?? "")).filter(Boolean);
}

async function main() {
  const env = envSchema.omit({ GOOGLE_MAPS_API_KEY: true }).parse(process.env);

  const INPUT = env.INPUT_CSV;
  const CHECKPOINT = env.CHECKPOINT_PATH;
  const VALIDATED = path.join(env.OUTPUT_DIR, "golf_courses_validated.csv");
  const ERRORS = path.join(env.OUTPUT_DIR, "golf_courses_errors.csv");
  const OUT = path.join(env.OUTPUT_DIR, "pipeline_summary.json");

  const result = await withErrorHandling(async () => {
    const inputRows = await loadDataset(INPUT);
    const checkpointRows = (await readRowsIfExists(CHECKPOINT)) ?? [];
    const validatedRows = (await readRowsIfExists(VALIDATED)) ?? [];
    const errorRows = (await readRowsIfExists(ERRORS)) ?? [];

    const stillMissing = namesOf(checkpointRows.filter(needsEnrichment));

    const confidenceCounts: Record<string, number> = {};
    for (const r of checkpointRows) {
      const c = String(r[COLUMNS.confidence] || "unknown");
      confidenceCounts[c] = (confidenceCounts[c] ?? 0) + 1;
    }

    const summary = {
      paths: {
        input: INPUT,
        checkpoint: CHECKPOINT,
        validated: VALIDATED,
        errors: ERRORS,
        out: OUT,
      },
      counts: {
        input: inputRows.length,
        input_missing_address: inputRows.filter(needsEnrichment).length,
        enriched: checkpointRows.length,
        validated: validatedRows.length,
        errors: errorRows.length,
      },
      still_missing_address: stillMissing,
      confidence_counts: confidenceCounts,
      failed_courses: namesOf(errorRows),
    };

    await fs.mkdir(path.dirname(OUT), { recursive: true });
    await fs.writeFile(OUT, JSON.stringify(summary, null, 2), "utf8");

    console.log(`✅ Wrote ${OUT}`);
    console.log(`📊 Validated: ${validatedRows.length}/${inputRows.length}, errors: ${errorRows.length}`);

    return summary;
  }, "Pipeline summary");

  if (!result.success) {
    console.error("❌ pipeline_summary failed:", result.errors);
    process.exit(1);
  }
}

main().catch((e) => {
  console.error("❌ pipeline_summary crashed:", e);
  process.exit(1);
});
