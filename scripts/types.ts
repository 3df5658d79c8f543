// Shared types for script files

export type Cell = string | number | null;

/** One row of a course dataset, keyed by column header. */
export type DatasetRow = Record<string, Cell>;

export const COLUMNS = {
  courseName: "Course Name",
  country: "Country",
  countryCode: "Country Code",
  courseType: "Course Type",
  address: "Address",
  postCode: "Post Code",
  latitude: "Latitude",
  longitude: "Longitude",
  par: "Par",
  courseIndex: "Course Index",
  slopeRating: "Slope Rating",
  confidence: "Confidence",
} as const;

export type AddressComponent = {
  long_name: string;
  short_name?: string;
  types: string[];
};

export type PlaceGeometry = {
  location: { lat: number; lng: number };
  location_type?: string; // ROOFTOP / GEOMETRIC_CENTER / APPROXIMATE ...
};

export type PlaceCandidate = {
  place_id?: string;
  formatted_address?: string;
  geometry?: PlaceGeometry;
  types?: string[];
  name?: string;
  partial_match?: boolean;
};

export type PlaceDetails = {
  address_components?: AddressComponent[];
  geometry?: PlaceGeometry;
  types?: string[];
  name?: string;
  partial_match?: boolean;
};

export type FindPlaceResponse = {
  status: string;
  candidates?: PlaceCandidate[];
  error_message?: string;
};

export type PlaceDetailsResponse = {
  status: string;
  result?: PlaceDetails;
  error_message?: string;
};

/** The two lookups the enrichment step needs from a places service. */
export interface PlaceLookup {
  findPlace(input: string, fields: string[]): Promise<FindPlaceResponse>;
  placeDetails(placeId: string, fields: string[]): Promise<PlaceDetailsResponse>;
}

export type Confidence = "High" | "Medium" | "Low";
