import type { ParsedQuake } from "@infogempa/types";

export interface BulletinOptions {
  /** Where the epicenter lies, e.g. "darat" or "laut". Omitted from the text when unset. */
  setting?: string;
}

export interface Bulletin {
  title: string;
  body: string;
}

function toTitleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, boundary: string, letter: string) => {
    return boundary + letter.toUpperCase();
  });
}

function coordinateText(quake: ParsedQuake): string {
  const latitude = quake.latitudeLabel ?? `${quake.latitude}°`;
  const longitude = quake.longitudeLabel ?? `${quake.longitude}°`;
  return `${latitude} ; ${longitude}`;
}

/** Builds the Indonesian alert text published for a parsed message. */
export function formatBulletin(quake: ParsedQuake, options: BulletinOptions = {}): Bulletin {
  const magnitude = quake.magnitude.toFixed(1);
  const where = options.setting ? `berlokasi di ${options.setting} pada jarak` : "berlokasi pada jarak";

  const title = `*GEMPABUMI TEKTONIK M${magnitude} DI ${quake.placeName.toUpperCase()}, TIDAK BERPOTENSI TSUNAMI*`;
  const body = [
    "*Kejadian dan Parameter Gempabumi:*",
    `Hari ${quake.dayName}, ${quake.originDate} pukul ${quake.timeString} wilayah ${toTitleCase(quake.placeName)} ` +
      `diguncang gempa tektonik. Hasil analisis BMKG menunjukkan gempabumi ini memiliki parameter dengan ` +
      `magnitudo M${magnitude}. Episenter gempabumi terletak pada koordinat ${coordinateText(quake)}, ` +
      `atau tepatnya ${where} ${quake.locationRemark} pada kedalaman ${quake.depthKm} km.`,
  ].join("\n");

  return { title, body };
}

export function renderBulletin(bulletin: Bulletin): string {
  return `${bulletin.title}\n${bulletin.body}`;
}
