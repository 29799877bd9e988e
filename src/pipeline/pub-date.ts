export type PubDateResult =
  | { ok: true; date: Date }
  | { ok: false; error: string };

const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];
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
];
const UTC_ZONES = new Set(["GMT", "UTC", "UT", "Z"]);

// Www, DD Mon YYYY HH:MM:SS ZONE
const RFC822_PATTERN =
  /^([A-Za-z]{3}), (\d{1,2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) ([A-Za-z]{1,3}|[+-]\d{4})$/;

function zoneOffsetMinutes(zone: string): number | null {
  if (UTC_ZONES.has(zone.toUpperCase())) return 0;

  const match = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (!match) return null;

  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 23 || minutes > 59) return null;

  const offset = hours * 60 + minutes;
  return match[1] === "-" ? -offset : offset;
}

/**
 * Parses an RSS publication date such as `Mon, 01 Jan 2024 10:00:00 GMT`.
 * Anything that does not match the format exactly, or names a date that does
 * not exist, is rejected.
 */
export function parsePublishedDate(raw: string): PubDateResult {
  const trimmed = raw.trim();
  const match = RFC822_PATTERN.exec(trimmed);
  if (!match) {
    return { ok: false, error: `unrecognised publication date: "${raw}"` };
  }

  const [, weekday, day, monthName, year, hour, minute, second, zone] = match;
  if (
    weekday === undefined ||
    day === undefined ||
    monthName === undefined ||
    year === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined ||
    zone === undefined
  ) {
    return { ok: false, error: `unrecognised publication date: "${raw}"` };
  }

  if (!WEEKDAYS.includes(weekday.toLowerCase())) {
    return { ok: false, error: `unknown weekday "${weekday}" in "${raw}"` };
  }

  const month = MONTHS.indexOf(monthName.toLowerCase());
  if (month === -1) {
    return { ok: false, error: `unknown month "${monthName}" in "${raw}"` };
  }

  const offset = zoneOffsetMinutes(zone);
  if (offset === null) {
    return { ok: false, error: `unknown time zone "${zone}" in "${raw}"` };
  }

  const fields = {
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };

  // setUTCFullYear, unlike Date.UTC, keeps years 0-99 as written.
  const wallClock = new Date(0);
  wallClock.setUTCFullYear(fields.year, fields.month, fields.day);
  wallClock.setUTCHours(fields.hour, fields.minute, fields.second, 0);

  // 31 Feb rolls over into March; a round trip catches that.
  if (
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 59 ||
    wallClock.getUTCFullYear() !== fields.year ||
    wallClock.getUTCMonth() !== fields.month ||
    wallClock.getUTCDate() !== fields.day
  ) {
    return { ok: false, error: `publication date out of range: "${raw}"` };
  }

  return { ok: true, date: new Date(wallClock.getTime() - offset * 60_000) };
}
