import { z } from "zod";

export const EventSourceSchema = z.literal("BMKG");

export type EventSource = z.infer<typeof EventSourceSchema>;

export const EventRecordSchema = z.object({
  eventId: z.string().regex(/^BMKG-\d{14}$/),
  source: EventSourceSchema,
  time: z.string(), // Event origin time, UTC ISO-8601
  receiveTime: z.string(), // When the message was parsed
  receiveSource: z.string(), // Station trailer the message came from
  latitude: z.number(),
  longitude: z.number(),
  magnitude: z.number(),
  depth: z.number().int(),
  region: z.string().min(1),
  advisory: z.string().min(1),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;

export const ParsedQuakeSchema = z.object({
  magnitude: z.number(),
  dayName: z.string(),
  originDate: z.string(), // "21 Mei 2024"
  calendarDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  timeString: z.string(), // "18:29:27 WIB"
  timeZone: z.string(),
  depthKm: z.number().int(),
  latitude: z.number(),
  longitude: z.number(),
  latitudeLabel: z.nullable(z.string()),
  longitudeLabel: z.nullable(z.string()),
  locationRemark: z.string(),
  placeName: z.string(),
});

export type ParsedQuake = z.infer<typeof ParsedQuakeSchema>;

export const ParserSettingsSchema = z
  .object({
    latitudeMin: z.number().finite(),
    latitudeMax: z.number().finite(),
    locationJoiner: z.string().min(1),
  })
  .refine((settings) => settings.latitudeMin <= settings.latitudeMax, {
    message: "latitudeMin must not exceed latitudeMax",
    path: ["latitudeMin"],
  });

export type ParserSettings = z.infer<typeof ParserSettingsSchema>;
