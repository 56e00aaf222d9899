/**
 * Maps English calendar names to the names used in the bulletins.
 * Returning undefined marks the name as unknown.
 */
export interface CalendarTranslator {
  translateDay(englishDayName: string): string | undefined;
  translateMonth(englishMonthAbbrev: string): string | undefined;
}

const INDONESIAN_DAYS: Record<string, string> = {
  Monday: "Senin",
  Tuesday: "Selasa",
  Wednesday: "Rabu",
  Thursday: "Kamis",
  Friday: "Jumat",
  Saturday: "Sabtu",
  Sunday: "Minggu",
};

const INDONESIAN_MONTHS: Record<string, string> = {
  Jan: "Januari",
  Feb: "Februari",
  Mar: "Maret",
  Apr: "April",
  May: "Mei",
  Jun: "Juni",
  Jul: "Juli",
  Aug: "Agustus",
  Sep: "September",
  Oct: "Oktober",
  Nov: "November",
  Dec: "Desember",
};

export const indonesianCalendar: CalendarTranslator = {
  translateDay: (englishDayName) => INDONESIAN_DAYS[englishDayName],
  translateMonth: (englishMonthAbbrev) => INDONESIAN_MONTHS[englishMonthAbbrev],
};
