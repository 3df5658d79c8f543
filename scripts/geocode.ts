import { buildCleanAddress, calculateConfidence, extractPostalCode } from "./address";
import { writeDataset } from "./dataset";
import { PlacesApiError, PlacesTransportError, isCredentialError } from "./errors";
import { GooglePlacesClient } from "./places_client";
import { COLUMNS, type DatasetRow, type PlaceDetails, type PlaceLookup } from "./types";

const FIND_FIELDS = ["place_id", "formatted_address", "geometry", "types"];
// "address_component" / "type" are the singular names Place Details expects
const DETAILS_FIELDS = ["address_component", "geometry", "type", "name"];

const TARGET_TYPES = ["golf_course"];
const KEYWORD = "golf";

const CHECKPOINT_EVERY = 10;
const THROTTLE_MS = 100;

export type EnrichOptions = {
  /** Rows needing enrichment above which every row is followed by a pause. */
  throttleThreshold?: number;
  checkpointPath?: string;
  throttleMs?: number;
  sleep?: (ms: number) => Promise<void>;
  saveCheckpoint?: (checkpointPath: string, rows: DatasetRow[]) => Promise<void>;
};

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function needsEnrichment(row: DatasetRow) {
  const v = row[COLUMNS.address];
  return v === undefined || v === null || String(v).trim() === "";
}

function withLocationType(result: PlaceDetails, locationType: string | undefined): PlaceDetails {
  if (!locationType || !result.geometry || result.geometry.location_type) return result;
  return { ...result, geometry: { ...result.geometry, location_type: locationType } };
}

/**
 * Fill Address / Latitude / Longitude / Post Code / Confidence for rows with
 * no address, using Find Place then Place Details.
 *
 * Returns the enriched subset (rows that needed enrichment, in input order),
 * or the input untouched when nothing needs enriching. Progress is written to
 * `checkpointPath` every 10 rows and once more at the end.
 */
export async function enrichCourseAddresses(
  rows: DatasetRow[],
  lookup: string | PlaceLookup,
  opts: EnrichOptions = {}
): Promise<DatasetRow[]> {
  const throttleThreshold = opts.throttleThreshold ?? 100;
  const checkpointPath = opts.checkpointPath ?? "data/enriched_courses.csv";
  const throttleMs = opts.throttleMs ?? THROTTLE_MS;
  const pause = opts.sleep ?? sleep;
  const save = opts.saveCheckpoint ?? ((p: string, data: DatasetRow[]) => writeDataset(p, data));

  const work = rows.filter(needsEnrichment).map((r) => ({ ...r }));
  const total = work.length;

  if (total === 0) {
    console.log("✅ All golf courses have location data. Skipping geocoding.");
    return rows;
  }

  console.log(`📊 Found ${total} records to enrich.`);

  const client = typeof lookup === "string" ? new GooglePlacesClient(lookup) : lookup;

  for (const [i, row] of work.entries()) {
    const count = i + 1;
    const rawName = row[COLUMNS.courseName];
    if (rawName === undefined || rawName === null || rawName === "") continue;
    const courseName = String(rawName);

    try {
      const found = await client.findPlace(courseName, FIND_FIELDS);
      const candidate = found.status === "OK" ? found.candidates?.[0] : undefined;

      if (candidate) {
        // Precision is only reliable from Find Place
        const locationType = candidate.geometry?.location_type;

        row[COLUMNS.address] = candidate.formatted_address ?? null;
        if (candidate.geometry) {
          row[COLUMNS.latitude] = candidate.geometry.location.lat;
          row[COLUMNS.longitude] = candidate.geometry.location.lng;
        }

        if (candidate.place_id) {
          const details = await client.placeDetails(candidate.place_id, DETAILS_FIELDS);

          if (details.status === "OK") {
            const result = withLocationType(details.result ?? {}, locationType);
            const components = result.address_components ?? [];

            row[COLUMNS.postCode] = extractPostalCode(components);
            row[COLUMNS.address] = buildCleanAddress(components);
            row[COLUMNS.confidence] = calculateConfidence(result, {
              searchQuery: courseName,
              targetTypes: TARGET_TYPES,
              keyword: KEYWORD,
            });
          }
        }
      }
    } catch (e) {
      if (!(e instanceof PlacesApiError || e instanceof PlacesTransportError)) throw e;

      console.error(`❌ Network or API Error for ${courseName}: ${e.message}`);
      if (isCredentialError(e)) {
        console.error("❌ API key rejected, stopping enrichment.");
        break;
      }
    }

    if (total > throttleThreshold) await pause(throttleMs);

    if (count % CHECKPOINT_EVERY === 0) {
      await save(checkpointPath, work);
      console.log(`💾 Progress saved: ${count}/${total} rows processed.`);
    }
  }

  await save(checkpointPath, work);
  console.log(`✅ Enrichment complete. Final data saved to ${checkpointPath}`);

  return work;
}

/** Put enriched rows back in place of their originals, matched by course name. */
export function mergeEnriched(rows: DatasetRow[], enriched: DatasetRow[]): DatasetRow[] {
  const byName = new Map<string, DatasetRow>();
  for (const r of enriched) byName.set(String(r[COLUMNS.courseName]), r);
  return rows.map((r) => byName.get(String(r[COLUMNS.courseName])) ?? r);
}
