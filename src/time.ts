const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

// Date, optional time, optional zone. A missing zone means UTC.
const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export interface CalendarParts {
  date: string;
  hour: number;
  day_of_week: string;
  week_start: string;
}

function normalizeZone(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === "Z") return "Z";
  const sign = zone[0];
  const digits = zone.slice(1).replace(":", "");
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || "00";
  return `${sign}${hours}:${minutes}`;
}

/** Parse an ISO-8601 timestamp into epoch milliseconds, or null if unparsable. */
export function parseTimestamp(value: string): number | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, date, time = "00:00:00", zone] = match;
  // Date.parse rolls impossible dates (Feb 30, 24:00) over; read the wall
  // clock back as UTC and require it unchanged.
  const wallClock = Date.parse(`${date}T${time}Z`);
  if (
    Number.isNaN(wallClock) ||
    new Date(wallClock).toISOString().slice(0, 16) !== `${date}T${time.slice(0, 5)}`
  ) {
    return null;
  }

  const ms = Date.parse(`${date}T${time}${normalizeZone(zone)}`);
  return Number.isNaN(ms) ? null : ms;
}

/** Format as `YYYY-MM-DDTHH:MM:SS` in UTC, without fraction or zone. */
export function formatTimestamp(value: number | Date): string {
  return new Date(value).toISOString().slice(0, 19);
}

export function toDateKey(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Derive the UTC calendar columns for an instant. `week_start` is the Monday
 * that opens the instant's ISO week.
 */
export function calendarParts(ms: number): CalendarParts {
  const d = new Date(ms);
  const day = d.getUTCDay();
  const sinceMonday = (day + 6) % 7;
  const monday = Date.UTC(
    d.getUTCFullYear(),
    d.getUTCMonth(),
    d.getUTCDate() - sinceMonday
  );

  return {
    date: toDateKey(ms),
    hour: d.getUTCHours(),
    day_of_week: WEEKDAYS[day],
    week_start: toDateKey(monday),
  };
}
