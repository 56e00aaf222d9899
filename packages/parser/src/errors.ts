export type ExtractionErrorKind =
  | "NotFound"
  | "Ambiguous"
  | "InvalidDateTime"
  | "MalformedTimeString"
  | "MissingRemark"
  | "OutOfBounds"
  | "TranslationUnavailable";

export type MessageField =
  | "magnitude"
  | "datetime"
  | "depth"
  | "coordinates"
  | "latitude"
  | "location"
  | "calendar";

/** Messages known to parse, quoted back to operators when a message is rejected. */
export const RECOGNIZED_FORMATS = [
  "Info Gempa. Mag:2.9, 21-mei-24 18:29:27 WIB, Lok:0.30 LS,100.28 BT (9 km Tenggara Bukittinggi), Kedlmn: 10 Km ::BMKG-PGR VI",
  "Info Gempa Mag:3.0, 21-Jan-24 18:29:27 WIB,Lok: 2.52 LS - 102.26 BT (49 km Tenggara MERANGIN-JAMBI), Kedlmn: 5 Km ::BMKG-KSI",
] as const;

export function recognizedFormatsHint(): string {
  return RECOGNIZED_FORMATS.map((example) => `[${example}]`).join(" or ");
}

export abstract class MessageParseError extends Error {
  /** Substring of the message the failure was detected in. */
  readonly raw: string;

  protected constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.raw = raw;
  }
}

/** The message cannot be segmented into its comma-delimited fields. */
export class FormatError extends MessageParseError {
  readonly name = "FormatError";
  readonly segmentCount: number;

  constructor(raw: string, segmentCount: number) {
    super(
      `Short message format unrecognized in "${raw}" (${segmentCount} comma-separated segments, expected 4 or 5), ` +
        `please use a recognized format such as ${recognizedFormatsHint()}`,
      raw,
    );
    this.segmentCount = segmentCount;
  }
}

export class ExtractionError extends MessageParseError {
  readonly name = "ExtractionError";
  readonly kind: ExtractionErrorKind;
  readonly field: MessageField;

  constructor(
    kind: ExtractionErrorKind,
    field: MessageField,
    message: string,
    raw: string,
    options?: { cause?: unknown },
  ) {
    super(message, raw, options);
    this.kind = kind;
    this.field = field;
  }
}

export function isMessageParseError(err: unknown): err is MessageParseError {
  return err instanceof MessageParseError;
}
