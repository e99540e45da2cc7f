const ISO_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/u;

const LEGACY_TIMESTAMP_PATTERN = /^(\d{2})-([A-Za-z]{3})-(\d{2})-(\d{2}):(\d{2})$/u;

const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
] as const;

export interface ParseTimestampOptions {
  /** How to read a timestamp without an offset. Defaults to "utc". */
  zone?: "utc" | "local";
}

/**
 * Parses `YYYY-MM-DD[(T| )HH:MM[:SS[.ffffff]]][Z|±HH:MM]`. Returns undefined
 * for anything else, including out-of-range fields.
 */
export function parseIsoTimestamp(
  text: string,
  options: ParseTimestampOptions = {},
): Date | undefined {
  const match = ISO_TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour ?? 0),
    minute: Number(minute ?? 0),
    second: Number(second ?? 0),
    millisecond: fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0,
  };

  if (offset === undefined) {
    return buildDate(fields, options.zone ?? "utc", 0);
  }

  return buildDate(fields, "utc", parseOffsetMinutes(offset));
}

/**
 * Parses the `07-Mar-21-14:30` form older sidecars used, in local time.
 */
export function parseLegacyTimestamp(text: string): Date | undefined {
  const match = LEGACY_TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [, day, monthName, year, hour, minute] = match;
  const monthIndex = MONTHS.findIndex(
    (name) => name === monthName?.toLowerCase(),
  );
  if (monthIndex === -1) {
    return undefined;
  }

  return buildDate(
    {
      year: 2000 + Number(year),
      month: monthIndex + 1,
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: 0,
      millisecond: 0,
    },
    "local",
    0,
  );
}

/** Years `formatIsoTimestamp` writes as exactly four digits. */
export function hasFourDigitYear(date: Date): boolean {
  const year = date.getUTCFullYear();
  return year >= 0 && year <= 9999;
}

/**
 * `YYYY-MM-DDTHH:MM:SS+00:00` in UTC, with `.mmm` when milliseconds are set.
 */
export function formatIsoTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  const milliseconds = date.getUTCMilliseconds();
  const fraction = milliseconds > 0 ? `.${pad(milliseconds, 3)}` : "";

  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}` +
    `${fraction}+00:00`
  );
}

/** `YYYY-MM-DD HH:MM UTC`; "unknown" for an invalid date. */
export function formatDisplayTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return "unknown";
  }
  return `${formatIsoTimestamp(date).slice(0, 16).replace("T", " ")} UTC`;
}

interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function buildDate(
  fields: DateFields,
  zone: "utc" | "local",
  offsetMinutes: number,
): Date | undefined {
  if (
    fields.month < 1 ||
    fields.month > 12 ||
    fields.day < 1 ||
    fields.day > 31 ||
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 59
  ) {
    return undefined;
  }

  const { year, month, day, hour, minute, second, millisecond } = fields;
  // The Date constructors read years 0-99 as 1900-1999; set the full year.
  const date = new Date(0);
  if (zone === "utc") {
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, millisecond);
  } else {
    date.setFullYear(year, month - 1, day);
    date.setHours(hour, minute, second, millisecond);
  }

  // Rejects rollovers such as February 30th.
  const checkDay = zone === "utc" ? date.getUTCDate() : date.getDate();
  if (checkDay !== day) {
    return undefined;
  }

  return new Date(date.getTime() - offsetMinutes * 60_000);
}

function parseOffsetMinutes(offset: string): number {
  if (offset === "Z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}
