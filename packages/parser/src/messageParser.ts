import type { ParsedQuake } from "@infogempa/types";
import { resolveConfig, type ParserConfig, type ParserConfigOverrides } from "./config";
import { ExtractionError, FormatError, recognizedFormatsHint, type MessageField } from "./errors";

/** The four semantic fields of an Info Gempa message. */
export interface FieldSet {
  magnitude: string;
  datetime: string;
  location: string;
  depth: string;
}

export type OriginTime = Pick<ParsedQuake, "dayName" | "originDate" | "calendarDate" | "timeString" | "timeZone">;

export type QuakeLocation = Pick<
  ParsedQuake,
  "latitude" | "longitude" | "latitudeLabel" | "longitudeLabel" | "locationRemark" | "placeName"
>;

const SIGNED_NUMBER = /[-+]?(\d*\.?\d+)/g;
const COORDINATE = /\d+\.\d+/g;
const REMARK = /\(([^)]+)/;

// Local month abbreviations that differ from the English ones
const MONTH_ALIASES: Record<string, string> = {
  mei: "May",
  agu: "Aug",
  okt: "Oct",
  des: "Dec",
};

const MONTH_ABBREVIATIONS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const DAY_OF_MONTH = /^(?:3[01]|[12]\d|0[1-9]|[1-9])$/;
const TWO_DIGIT_YEAR = /^\d{2}$/;

const LATITUDE_TAGS = { south: "LS", north: "LU" } as const;
const LONGITUDE_TAGS = { west: "BB", east: "BT" } as const;

/**
 * Splits a message into its fields. Upstream senders sometimes put a comma
 * between latitude and longitude, giving five segments instead of four; the
 * two coordinate segments are joined back together in that case.
 */
export function splitFields(raw: string, joiner = " - "): FieldSet {
  const segments = raw.split(",");

  if (segments.length === 4) {
    const [magnitude, datetime, location, depth] = segments;
    return { magnitude: magnitude.trim(), datetime: datetime.trim(), location: location.trim(), depth: depth.trim() };
  }

  if (segments.length === 5) {
    const [magnitude, datetime, latitudePart, longitudePart, depth] = segments;
    return {
      magnitude: magnitude.trim(),
      datetime: datetime.trim(),
      location: `${latitudePart}${joiner}${longitudePart}`.trim(),
      depth: depth.trim(),
    };
  }

  throw new FormatError(raw, segments.length);
}

/**
 * Parses a `dd-mmm-yy` token. Two-digit years 00-68 land in the 2000s and
 * 69-99 in the 1900s. Returns null when the token is not a real date.
 */
export function parseCalendarDate(token: string | undefined): Date | null {
  if (!token) return null;

  const parts = token.split("-");
  if (parts.length !== 3) return null;
  const [dayPart, monthPart, yearPart] = parts;

  if (!DAY_OF_MONTH.test(dayPart) || !TWO_DIGIT_YEAR.test(yearPart)) return null;

  const english = MONTH_ALIASES[monthPart.toLowerCase()] ?? monthPart;
  const month = MONTH_ABBREVIATIONS.findIndex((abbrev) => abbrev.toLowerCase() === english.toLowerCase());
  if (month < 0) return null;

  const day = Number(dayPart);
  const shortYear = Number(yearPart);
  const year = shortYear < 69 ? 2000 + shortYear : 1900 + shortYear;

  const date = new Date(Date.UTC(year, month, day));
  // Rolled over into the next month, e.g. 31-Feb
  if (date.getUTCMonth() !== month) return null;

  return date;
}

function pad(part: number): string {
  return String(part).padStart(2, "0");
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

export class MessageParser {
  readonly raw: string;
  readonly fields: FieldSet;
  private readonly config: ParserConfig;

  private magnitude: number | null = null;
  private origin: OriginTime | null = null;
  private depth: number | null = null;
  private location: QuakeLocation | null = null;

  constructor(raw: string, config: ParserConfigOverrides = {}) {
    this.raw = raw;
    this.config = resolveConfig(config);
    this.fields = splitFields(raw, this.config.locationJoiner);
  }

  /** Runs every extractor in order and stops at the first failure. */
  parseAll(): ParsedQuake {
    const magnitude = this.extractMagnitude();
    const origin = this.extractOriginTime();
    const depthKm = this.extractDepth();
    const location = this.extractLocation();

    return { magnitude, ...origin, depthKm, ...location };
  }

  /** Everything extracted so far. */
  snapshot(): Partial<ParsedQuake> {
    return {
      ...(this.magnitude !== null ? { magnitude: this.magnitude } : {}),
      ...this.origin,
      ...(this.depth !== null ? { depthKm: this.depth } : {}),
      ...this.location,
    };
  }

  extractMagnitude(): number {
    if (this.magnitude === null) {
      const field = this.fields.magnitude;
      const value = this.singleNumber(
        field,
        "magnitude",
        `Magnitude number can't be found in "${field}", the magnitude shall be inside Info Gempa Mag:X.Y`,
      );
      this.magnitude = value;
    }
    return this.magnitude;
  }

  extractOriginTime(): OriginTime {
    if (this.origin !== null) return { ...this.origin };

    const field = this.fields.datetime;
    const tokens = field.split(/\s+/).filter(Boolean);

    const date = parseCalendarDate(tokens[0]);
    if (!date) {
      throw new ExtractionError(
        "InvalidDateTime",
        "datetime",
        `Cannot determine date in "${field}", it should be dd-mmm-yy`,
        field,
      );
    }

    if (tokens.length !== 3) {
      throw new ExtractionError(
        "MalformedTimeString",
        "datetime",
        `Time string in "${field}" is not properly split, please refer to ${recognizedFormatsHint()} as example`,
        field,
      );
    }

    const englishDay = DAY_NAMES[date.getUTCDay()];
    const englishMonth = MONTH_ABBREVIATIONS[date.getUTCMonth()];
    const dayName = this.translate("day", englishDay, field);
    const monthName = this.translate("month", englishMonth, field);

    const [, time, timeZone] = tokens;
    this.origin = {
      dayName,
      originDate: `${date.getUTCDate()} ${monthName} ${date.getUTCFullYear()}`,
      calendarDate: `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`,
      timeString: `${time} ${timeZone}`,
      timeZone,
    };
    return { ...this.origin };
  }

  extractDepth(): number {
    if (this.depth === null) {
      const field = this.fields.depth;
      const notFound = `Depth number can't be found in "${field}", the depth shall be inside Kedlmn:X Km`;
      const value = this.singleNumber(field, "depth", notFound);
      if (!Number.isInteger(value)) {
        throw new ExtractionError("NotFound", "depth", notFound, field);
      }
      this.depth = value;
    }
    return this.depth;
  }

  extractLocation(): QuakeLocation {
    if (this.location !== null) return { ...this.location };

    const field = this.fields.location;

    const remark = REMARK.exec(field)?.[1];
    if (remark === undefined) {
      throw new ExtractionError(
        "MissingRemark",
        "location",
        `Location remark in parentheses can't be found in "${field}"`,
        field,
      );
    }
    const words = remark.split(/\s+/).filter(Boolean);
    const placeName = (words[words.length - 1] ?? "").replace(/-/g, ", ");

    const candidates = (field.match(COORDINATE) ?? []).map(Number);
    if (candidates.length < 2) {
      throw new ExtractionError(
        "NotFound",
        "coordinates",
        `Either latitude or longitude not found in "${field}" (found [${candidates.join(", ")}])`,
        field,
      );
    }
    if (candidates.length > 2) {
      throw new ExtractionError(
        "Ambiguous",
        "coordinates",
        `Too many numbers in "${field}", can't determine latitude and longitude from [${candidates.join(", ")}]`,
        field,
      );
    }

    const [first, second] = candidates;
    let latitude: number;
    let longitude: number;
    if (this.withinLatitude(first)) {
      latitude = first;
      longitude = second;
    } else if (this.withinLatitude(second)) {
      latitude = second;
      longitude = first;
    } else {
      throw new ExtractionError(
        "OutOfBounds",
        "latitude",
        `Latitude of [${candidates.join(", ")}] in "${field}" is outside ` +
          `[${this.config.latitudeMin}, ${this.config.latitudeMax}]`,
        field,
      );
    }

    // A missing hemisphere tag leaves the value unsigned and the label unset.
    let latitudeLabel: string | null = null;
    if (field.includes(LATITUDE_TAGS.south)) {
      latitudeLabel = `${latitude}° ${LATITUDE_TAGS.south}`;
      latitude = negate(latitude);
    } else if (field.includes(LATITUDE_TAGS.north)) {
      latitudeLabel = `${latitude}° ${LATITUDE_TAGS.north}`;
    }

    let longitudeLabel: string | null = null;
    if (field.includes(LONGITUDE_TAGS.west)) {
      longitudeLabel = `${longitude}° ${LONGITUDE_TAGS.west}`;
      longitude = negate(longitude);
    } else if (field.includes(LONGITUDE_TAGS.east)) {
      longitudeLabel = `${longitude}° ${LONGITUDE_TAGS.east}`;
    }

    this.location = { latitude, longitude, latitudeLabel, longitudeLabel, locationRemark: remark, placeName };
    return { ...this.location };
  }

  private singleNumber(field: string, name: MessageField, notFound: string): number {
    const matches = field.match(SIGNED_NUMBER) ?? [];
    if (matches.length < 1) {
      throw new ExtractionError("NotFound", name, notFound, field);
    }
    if (matches.length > 1) {
      throw new ExtractionError(
        "Ambiguous",
        name,
        `Too many numbers in "${field}", can't determine the real ${name} from [${matches.join(", ")}]`,
        field,
      );
    }
    return Number(matches[0]);
  }

  private withinLatitude(value: number): boolean {
    return value >= this.config.latitudeMin && value <= this.config.latitudeMax;
  }

  private translate(kind: "day" | "month", englishName: string, field: string): string {
    let translated: string | undefined;
    try {
      translated =
        kind === "day"
          ? this.config.translator.translateDay(englishName)
          : this.config.translator.translateMonth(englishName);
    } catch (err) {
      throw new ExtractionError(
        "TranslationUnavailable",
        "calendar",
        `No translation for ${kind} "${englishName}" of "${field}"`,
        field,
        { cause: err },
      );
    }

    if (!translated) {
      throw new ExtractionError(
        "TranslationUnavailable",
        "calendar",
        `No translation for ${kind} "${englishName}" of "${field}"`,
        field,
      );
    }
    return translated;
  }
}
