export { formatBulletin, renderBulletin, type Bulletin, type BulletinOptions } from "./bulletin";
export { resolveConfig, type ParserConfig, type ParserConfigOverrides } from "./config";
export {
  ExtractionError,
  FormatError,
  MessageParseError,
  RECOGNIZED_FORMATS,
  isMessageParseError,
  type ExtractionErrorKind,
  type MessageField,
} from "./errors";
export { parseInfoGempaMessage, toUtcOriginTime, type InfoGempaParseResult } from "./infoGempaParser";
export {
  MessageParser,
  parseCalendarDate,
  splitFields,
  type FieldSet,
  type OriginTime,
  type QuakeLocation,
} from "./messageParser";
export { indonesianCalendar, type CalendarTranslator } from "./translator";
