import type {
  FindPlaceResponse,
  PlaceCandidate,
  PlaceDetailsResponse,
  PlaceLookup,
} from "../../scripts/types";

export type FakePlace = {
  candidate?: PlaceCandidate;
  details?: PlaceDetailsResponse;
  error?: Error;
};

/** In-process stand-in for the Places service, keyed by search text. */
export class FakePlaces implements PlaceLookup {
  readonly findCalls: string[] = [];
  readonly detailCalls: string[] = [];

  constructor(private readonly places: Record<string, FakePlace> = {}) {}

  async findPlace(input: string, _fields: string[]): Promise<FindPlaceResponse> {
    this.findCalls.push(input);
    const place = this.places[input];
    if (place?.error) throw place.error;
    if (!place?.candidate) return { status: "ZERO_RESULTS", candidates: [] };
    return { status: "OK", candidates: [place.candidate] };
  }

  async placeDetails(placeId: string, _fields: string[]): Promise<PlaceDetailsResponse> {
    this.detailCalls.push(placeId);
    const place = Object.values(this.places).find((p) => p.candidate?.place_id === placeId);
    return place?.details ?? { status: "NOT_FOUND" };
  }
}

export const westerham: FakePlace = {
  candidate: {
    place_id: "place-westerham",
    formatted_address: "Valence Park, Brasted Rd, Westerham TN16 1QN, UK",
    geometry: { location: { lat: 51.27, lng: 0.07 }, location_type: "GEOMETRIC_CENTER" },
    types: ["golf_course", "establishment"],
  },
  details: {
    status: "OK",
    result: {
      name: "Westerham Golf Club",
      types: ["golf_course", "establishment", "point_of_interest"],
      geometry: { location: { lat: 51.27, lng: 0.07 } },
      address_components: [
        { long_name: "Valence Park", types: ["street_number"] },
        { long_name: "Brasted Road", types: ["route"] },
        { long_name: "Westerham", types: ["postal_town"] },
        { long_name: "TN16", types: ["postal_code"] },
        { long_name: "1QN", types: ["postal_code_suffix"] },
        { long_name: "United Kingdom", types: ["country", "political"] },
      ],
    },
  },
};
