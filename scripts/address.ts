import type { AddressComponent, Confidence, PlaceDetails } from "./types";

// Parsing helpers for Places API address components (UK conventions)

const EXCLUDED_TYPES = new Set(["postal_code", "postal_code_suffix", "country"]);

const hasType = (c: AddressComponent, type: string) => c.types.includes(type);

/**
 * Reassemble a postcode split across `postal_code` and `postal_code_suffix`
 * components, e.g. "TN16" + "1QN" -> "TN16 1QN".
 */
export function extractPostalCode(components: AddressComponent[]): string | null {
  let main = "";
  let suffix = "";

  for (const c of components) {
    if (hasType(c, "postal_code")) main = c.long_name;
    else if (hasType(c, "postal_code_suffix")) suffix = c.long_name;
  }

  if (main && suffix) return `${main} ${suffix}`;
  return main || suffix || null;
}

/**
 * Street + locality address without postcode or country.
 *
 * House numbers are joined to the route with a space ("10 Downing St");
 * named properties get a comma ("Valence Park, Brasted Rd").
 */
export function buildCleanAddress(components: AddressComponent[]): string {
  let streetNumber = "";
  let route = "";
  const localityParts: string[] = [];

  for (const c of components) {
    if (c.types.some((t) => EXCLUDED_TYPES.has(t))) continue;

    if (hasType(c, "street_number")) {
      if (!streetNumber) streetNumber = c.long_name;
    } else if (hasType(c, "route")) {
      if (!route) route = c.long_name;
    } else {
      localityParts.push(c.long_name);
    }
  }

  let streetBlock = streetNumber || route;
  if (streetNumber && route) {
    streetBlock = /\d/.test(streetNumber) ? `${streetNumber} ${route}` : `${streetNumber}, ${route}`;
  }

  return [streetBlock, ...localityParts].filter(Boolean).join(", ");
}

export type ConfidenceOptions = {
  searchQuery?: string;
  targetTypes?: string[];
  keyword?: string;
};

/**
 * How far a place result can be trusted to be the activity we searched for.
 * High beats Medium when both apply.
 */
export function calculateConfidence(result: PlaceDetails, opts: ConfidenceOptions = {}): Confidence {
  const types = result.types ?? [];
  const name = (result.name ?? "").toLowerCase();
  const query = (opts.searchQuery ?? "").toLowerCase();
  const keyword = (opts.keyword ?? "").toLowerCase();

  const typeMatch = (opts.targetTypes ?? []).some((t) => types.includes(t));
  const keywordMatch = keyword ? name.includes(keyword) || query.includes(keyword) : false;

  if ((typeMatch || keywordMatch) && !result.partial_match) return "High";
  if (types.includes("establishment") || types.includes("point_of_interest")) return "Medium";
  return "Low";
}
