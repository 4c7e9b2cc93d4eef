const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

const ISO_DATE =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[t ]\d{1,2}:\d{2}(?::\d{2})?\S*)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;
const DAY_MONTH_YEAR = /^(\d{1,2})[- ]([a-z]+)\.?[- ](\d{2}|\d{4})$/;
const MONTH_DAY_YEAR = /^([a-z]+)\.? (\d{1,2}),? (\d{4})$/;

function expandYear(raw: string): number {
  const year = Number(raw);
  if (raw.length === 4) return year;
  // POSIX %y pivot
  return year < 69 ? 2000 + year : 1900 + year;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  const pad = (value: number, width: number) =>
    String(value).padStart(width, "0");
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Parse a ledger date into an ISO calendar date (YYYY-MM-DD).
 *
 * Accepted forms:
 * - `2021-05-01`, `2021/05/01`, optionally followed by a time of day
 *   such as `08:15`, `08:15:30` or `T23:59:00.000Z`
 * - `5/1/2021`, `5/1/21` (month first)
 * - `01-May-21`, `1-May-2021`, `1 May 2021`, `1 September 2021`
 * - `May 1, 2021`, `September 1 2021`
 *
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseSaleDate(text: string): string | null {
  const value = text.trim().toLowerCase();
  if (value === "") return null;

  let match = ISO_DATE.exec(value);
  if (match) {
    return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = US_DATE.exec(value);
  if (match) {
    return toIsoDate(expandYear(match[3]), Number(match[1]), Number(match[2]));
  }

  match = DAY_MONTH_YEAR.exec(value);
  if (match) {
    const month = MONTHS[match[2]];
    if (month === undefined) return null;
    return toIsoDate(expandYear(match[3]), month, Number(match[1]));
  }

  match = MONTH_DAY_YEAR.exec(value);
  if (match) {
    const month = MONTHS[match[1]];
    if (month === undefined) return null;
    return toIsoDate(Number(match[3]), month, Number(match[2]));
  }

  return null;
}

export function yearOf(isoDate: string): number {
  return Number(isoDate.slice(0, 4));
}
