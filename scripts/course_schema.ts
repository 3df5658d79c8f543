import { z } from "zod";
import countryCodes from "./data/country_codes.json";
import { COLUMNS, type DatasetRow } from "./types";

export const CourseType = {
  NineHolePar3: "9 hole - par 3 course",
  NineHole: "9 hole",
  EighteenHole: "18 hole",
} as const;

export type CourseType = (typeof CourseType)[keyof typeof CourseType];

const COURSE_TYPES = [CourseType.NineHolePar3, CourseType.NineHole, CourseType.EighteenHole] as const;

// Space between outward and inward code is optional
export const UK_POSTCODE_REGEX = /^[A-Z]{1,2}[0-9][A-Z0-9]? ?[0-9][A-Z]{2}$/;
export const FR_POSTCODE_REGEX = /^\d{5}$/;

const COUNTRY_ALPHA3 = new Set<string>(countryCodes);

const REQUIRED = "Field required";

// Blank CSV cells are missing values
function blankToUndefined(v: unknown) {
  if (v === null) return undefined;
  if (typeof v === "string" && v.trim() === "") return undefined;
  return v;
}

function toNumber(v: unknown) {
  const b = blankToUndefined(v);
  return typeof b === "string" ? Number(b.trim()) : b;
}

const text = () =>
  z.preprocess(
    blankToUndefined,
    z.string({ required_error: REQUIRED, invalid_type_error: "Input should be a valid string" })
  );

const num = () =>
  z.number({ required_error: REQUIRED, invalid_type_error: "Input should be a valid number" }).finite();

const int = () => num().int("Input should be a valid integer");

const bounded = (limit: number) =>
  num()
    .gte(-limit, `Input should be greater than or equal to ${-limit}`)
    .lte(limit, `Input should be less than or equal to ${limit}`);

export const courseFieldsSchema = z.object({
  course_name: text(),
  country: text(),
  country_code: text().refine((v) => COUNTRY_ALPHA3.has(v), "Invalid country alpha3 code"),
  course_type: z.preprocess(
    blankToUndefined,
    z.enum(COURSE_TYPES, {
      errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined ? REQUIRED : "Input should be '9 hole - par 3 course', '9 hole' or '18 hole'",
      }),
    })
  ),
  address: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: REQUIRED, invalid_type_error: "Input should be a valid string" })
      .min(5, "String should have at least 5 characters")
      .max(150, "String should have at most 150 characters")
  ),
  post_code: text(),
  latitude: z.preprocess(toNumber, bounded(90)),
  longitude: z.preprocess(toNumber, bounded(180)),
  par: z.preprocess(toNumber, int()),
  course_index: z.preprocess(toNumber, num()),
  slope_rating: z.preprocess(toNumber, int()),
});

export type CourseRecord = z.infer<typeof courseFieldsSchema>;
export type CourseField = keyof CourseRecord;

/** Dataset column for each record field. */
export const FIELD_COLUMNS: Record<CourseField, string> = {
  course_name: COLUMNS.courseName,
  country: COLUMNS.country,
  country_code: COLUMNS.countryCode,
  course_type: COLUMNS.courseType,
  address: COLUMNS.address,
  post_code: COLUMNS.postCode,
  latitude: COLUMNS.latitude,
  longitude: COLUMNS.longitude,
  par: COLUMNS.par,
  course_index: COLUMNS.courseIndex,
  slope_rating: COLUMNS.slopeRating,
};

const FIELDS = courseFieldsSchema.keyof().options;

export type FieldError = {
  field: CourseField;
  input: unknown;
  message: string;
};

type RawCourse = Record<CourseField, unknown>;

type CrossFieldRule = (raw: RawCourse) => FieldError | null;

const shape = courseFieldsSchema.shape;

const postcodeMatchesCountry: CrossFieldRule = (raw) => {
  const code = shape.country_code.safeParse(raw.country_code);
  const post = shape.post_code.safeParse(raw.post_code);
  if (!code.success || !post.success) return null;

  if (code.data === "GBR" && !UK_POSTCODE_REGEX.test(post.data)) {
    return { field: "post_code", input: raw.post_code, message: `Invalid UK postcode format: ${post.data}` };
  }
  if (code.data === "FRA" && !FR_POSTCODE_REGEX.test(post.data)) {
    return {
      field: "post_code",
      input: raw.post_code,
      message: `France postcodes must be exactly 5 digits: ${post.data}`,
    };
  }
  return null;
};

const parMatchesCourseType: CrossFieldRule = (raw) => {
  const type = shape.course_type.safeParse(raw.course_type);
  const par = shape.par.safeParse(raw.par);
  if (!type.success || !par.success) return null;

  const fail = (message: string): FieldError => ({ field: "par", input: raw.par, message });

  switch (type.data) {
    case CourseType.NineHolePar3:
      return par.data === 27 ? null : fail(`For a 9 Hole Par 3 course, par must be 27. Received: ${par.data}`);
    case CourseType.NineHole:
      return par.data >= 28 && par.data <= 45
        ? null
        : fail(`For a 9 Hole course, par must be between 28 and 45. Received: ${par.data}`);
    case CourseType.EighteenHole:
      return par.data >= 68 && par.data <= 74
        ? null
        : fail(`For an 18 Hole course, par must be between 68 and 74. Received: ${par.data}`);
  }
};

const CROSS_FIELD_RULES: CrossFieldRule[] = [postcodeMatchesCountry, parMatchesCourseType];

/** Read record fields from a row by column header, falling back to the field name. */
function rawCourse(row: DatasetRow): RawCourse {
  const read = (f: CourseField) => row[FIELD_COLUMNS[f]] ?? row[f];
  return {
    course_name: read("course_name"),
    country: read("country"),
    country_code: read("country_code"),
    course_type: read("course_type"),
    address: read("address"),
    post_code: read("post_code"),
    latitude: read("latitude"),
    longitude: read("longitude"),
    par: read("par"),
    course_index: read("course_index"),
    slope_rating: read("slope_rating"),
  };
}

export type CourseParseResult =
  | { success: true; record: CourseRecord }
  | { success: false; errors: FieldError[] };

/**
 * Build a CourseRecord from a dataset row. Field errors and cross-field
 * errors are collected together; a cross-field rule runs whenever the fields
 * it reads parsed on their own.
 */
export function parseCourseRecord(row: DatasetRow): CourseParseResult {
  const raw = rawCourse(row);
  const parsed = courseFieldsSchema.safeParse(raw);

  const errors: FieldError[] = [];
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = FIELDS.find((f) => f === issue.path[0]);
      if (!field) continue;
      errors.push({ field, input: raw[field], message: issue.message });
    }
  }

  for (const rule of CROSS_FIELD_RULES) {
    const err = rule(raw);
    if (err) errors.push(err);
  }

  if (parsed.success && errors.length === 0) return { success: true, record: parsed.data };
  return { success: false, errors };
}
