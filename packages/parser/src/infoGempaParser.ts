import { EventRecordSchema, type EventRecord, type ParsedQuake } from "@infogempa/types";
import type { ParserConfigOverrides } from "./config";
import { isMessageParseError } from "./errors";
import { MessageParser } from "./messageParser";

export interface InfoGempaParseResult {
  event: EventRecord | null;
  quake: ParsedQuake | null;
  rawLine: string;
  warning?: string;
}

// Hours ahead of UTC for the timezone labels used in the messages
const TIME_ZONE_OFFSETS: Record<string, number> = {
  WIB: 7,
  WITA: 8,
  WIT: 9,
  UTC: 0,
  GMT: 0,
};

const CLOCK = /^(\d{2}):(\d{2}):(\d{2})$/;
const STATION = /::\s*(\S+)/;

export function parseInfoGempaMessage(raw: string, config: ParserConfigOverrides = {}): InfoGempaParseResult {
  const rawLine = raw.trim();

  let quake: ParsedQuake;
  let depthField: string;
  try {
    const parser = new MessageParser(rawLine, config);
    quake = parser.parseAll();
    depthField = parser.fields.depth;
  } catch (err) {
    if (!isMessageParseError(err)) throw err;
    console.warn("[parser] Rejected Info Gempa message:", err.message);
    return { event: null, quake: null, rawLine, warning: err.message };
  }

  const originTime = toUtcOriginTime(quake);
  if (!originTime) {
    const warning = `Unknown origin time "${quake.timeString}"`;
    console.warn("[parser] Rejected Info Gempa message:", warning);
    return { event: null, quake, rawLine, warning };
  }

  const record = EventRecordSchema.safeParse({
    eventId: `BMKG-${quake.calendarDate.replace(/-/g, "")}${quake.timeString.slice(0, 8).replace(/:/g, "")}`,
    source: "BMKG",
    time: originTime,
    receiveTime: new Date().toISOString(),
    receiveSource: STATION.exec(depthField)?.[1] ?? "BMKG",
    latitude: quake.latitude,
    longitude: quake.longitude,
    magnitude: quake.magnitude,
    depth: quake.depthKm,
    region: quake.placeName,
    advisory: quake.locationRemark,
  } satisfies EventRecord);

  if (!record.success) {
    const warning = `Invalid event record: ${record.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")}`;
    console.warn("[parser] Rejected Info Gempa message:", warning);
    return { event: null, quake, rawLine, warning };
  }

  return { event: record.data, quake, rawLine };
}

/** Resolves the local clock time and timezone label into a UTC ISO timestamp. */
export function toUtcOriginTime(quake: Pick<ParsedQuake, "calendarDate" | "timeString" | "timeZone">): string | null {
  const offset = TIME_ZONE_OFFSETS[quake.timeZone.toUpperCase()];
  if (offset === undefined) return null;

  const clock = CLOCK.exec(quake.timeString.split(" ")[0] ?? "");
  if (!clock) return null;

  const [year, month, day] = quake.calendarDate.split("-").map(Number);
  const hour = Number(clock[1]);
  const minute = Number(clock[2]);
  const second = Number(clock[3]);
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour - offset, minute, second));
  if (Number.isNaN(date.getTime())) return null;

  return date.toISOString();
}
