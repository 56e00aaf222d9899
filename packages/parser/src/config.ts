import { ParserSettingsSchema, type ParserSettings } from "@infogempa/types";
import { indonesianCalendar, type CalendarTranslator } from "./translator";

export interface ParserConfig extends ParserSettings {
  translator: CalendarTranslator;
}

export type ParserConfigOverrides = Partial<ParserConfig>;

const DEFAULTS = {
  // Closed latitude range of Indonesian territory
  LATITUDE_MIN: -11.0,
  LATITUDE_MAX: 6.0,
  LOCATION_JOINER: " - ",
};

export function resolveConfig(overrides: ParserConfigOverrides = {}): ParserConfig {
  const settings = ParserSettingsSchema.safeParse({
    latitudeMin: overrides.latitudeMin ?? DEFAULTS.LATITUDE_MIN,
    latitudeMax: overrides.latitudeMax ?? DEFAULTS.LATITUDE_MAX,
    locationJoiner: overrides.locationJoiner ?? DEFAULTS.LOCATION_JOINER,
  });

  if (!settings.success) {
    const detail = settings.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid parser config: ${detail}`);
  }

  return {
    ...settings.data,
    translator: overrides.translator ?? indonesianCalendar,
  };
}
