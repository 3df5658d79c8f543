import { PlacesApiError, PlacesTransportError } from "./errors";
import type { FindPlaceResponse, PlaceDetailsResponse, PlaceLookup } from "./types";

const BASE_URL = "https://maps.googleapis.com/maps/api/place";

// Statuses that mean "no data" rather than a failed request
const NON_ERROR_STATUSES = new Set(["OK", "ZERO_RESULTS", "NOT_FOUND"]);

function isPlacesResponse(v: unknown): v is { status: string; error_message?: unknown } {
  return typeof v === "object" && v !== null && "status" in v && typeof v.status === "string";
}

/**
 * Minimal Google Places web service client: Find Place from Text and Place Details.
 */
export class GooglePlacesClient implements PlaceLookup {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = BASE_URL
  ) {}

  async findPlace(input: string, fields: string[]): Promise<FindPlaceResponse> {
    return this.request<FindPlaceResponse>("findplacefromtext", {
      input,
      inputtype: "textquery",
      fields: fields.join(","),
    });
  }

  async placeDetails(placeId: string, fields: string[]): Promise<PlaceDetailsResponse> {
    return this.request<PlaceDetailsResponse>("details", {
      place_id: placeId,
      fields: fields.join(","),
    });
  }

  private async request<T extends { status: string }>(endpoint: string, params: Record<string, string>): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}/json`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set("key", this.apiKey);

    let res: Response;
    try {
      res = await fetch(url.toString(), { headers: { "Accept-Language": "en" } });
    } catch (e) {
      throw new PlacesTransportError(`Request to ${endpoint} failed: ${String(e)}`, { endpoint });
    }

    if (!res.ok) {
      throw new PlacesTransportError(`HTTP ${res.status} ${res.statusText} from ${endpoint}`, {
        endpoint,
        status: res.status,
      });
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (e) {
      throw new PlacesTransportError(`Invalid JSON from ${endpoint}: ${String(e)}`, { endpoint });
    }

    if (!isPlacesResponse(data)) {
      throw new PlacesTransportError(`Unexpected response shape from ${endpoint}`, { endpoint });
    }

    if (!NON_ERROR_STATUSES.has(data.status)) {
      const message = typeof data.error_message === "string" ? data.error_message : undefined;
      throw new PlacesApiError(data.status, message);
    }

    // Response bodies are trusted past the status check
    return data as T;
  }
}
