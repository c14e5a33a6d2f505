import { ParseError } from '../errors/feed.errors';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

// "12 May 2016", "May 12 2016", "May 12, 2016" or "2016-05-12"
const DAY_MONTH_YEAR = /^(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})$/;
const MONTH_DAY_YEAR = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// "1400", "14:00" or "14:00:00", then the zone the feed clock runs on
const CLOCK_AND_ZONE = /^(\d{2}):?(\d{2})(?::(\d{2}))?\s+GMT$/;

interface TimeElementLike {
  attribs: Readonly<Record<string, string | undefined>>;
}

// Full month name or its three-letter abbreviation
function monthIndex(name: string): number | undefined {
  const lower = name.toLowerCase();
  const index = MONTHS.findIndex((month) => lower === month || lower === month.slice(0, 3));
  return index === -1 ? undefined : index;
}

function parseCalendarDate(value: string): { year: number; month: number; day: number } | undefined {
  let match = DAY_MONTH_YEAR.exec(value);
  if (match) {
    const month = monthIndex(match[2]);
    return month === undefined ? undefined : { year: Number(match[3]), month, day: Number(match[1]) };
  }

  match = MONTH_DAY_YEAR.exec(value);
  if (match) {
    const month = monthIndex(match[1]);
    return month === undefined ? undefined : { year: Number(match[3]), month, day: Number(match[2]) };
  }

  match = ISO_DATE.exec(value);
  if (match) {
    return { year: Number(match[1]), month: Number(match[2]) - 1, day: Number(match[3]) };
  }

  return undefined;
}

/**
 * Parse a `"<date> <start-time> GMT"` string into an absolute point in time.
 */
export function parseFeedTimestamp(value: string): Date {
  const trimmed = value.trim();
  const zoneStart = trimmed.search(/\s\S+\s+GMT$/);
  if (zoneStart === -1) {
    throw new ParseError(`Unrecognized match time "${value}"`);
  }

  const date = parseCalendarDate(trimmed.slice(0, zoneStart).trim());
  const clock = CLOCK_AND_ZONE.exec(trimmed.slice(zoneStart).trim());
  if (!date || !clock) {
    throw new ParseError(`Unrecognized match time "${value}"`);
  }

  const hours = Number(clock[1]);
  const minutes = Number(clock[2]);
  const seconds = clock[3] === undefined ? 0 : Number(clock[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ParseError(`Match time "${value}" is out of range`);
  }

  const timestamp = new Date(Date.UTC(date.year, date.month, date.day, hours, minutes, seconds));
  // Date.UTC rolls 30 Feb over into March; reject instead
  if (
    timestamp.getUTCFullYear() !== date.year ||
    timestamp.getUTCMonth() !== date.month ||
    timestamp.getUTCDate() !== date.day
  ) {
    throw new ParseError(`Match time "${value}" is out of range`);
  }

  return timestamp;
}

/**
 * Combine the `Dt` and `stTme` attributes of a match's `Tme` element.
 */
export function constructMatchTime(timeElement: TimeElementLike): Date {
  const date = timeElement.attribs['Dt'];
  const startTime = timeElement.attribs['stTme'];
  if (date === undefined || startTime === undefined) {
    throw new ParseError('Match time element needs both Dt and stTme');
  }
  return parseFeedTimestamp(`${date} ${startTime} GMT`);
}

const pad = (value: number) => value.toString().padStart(2, '0');

/**
 * Render a match time as `YYYY-MM-DDTHH:mm:ss+00:00`.
 */
export function formatMatchTime(time: Date): string {
  return (
    `${time.getUTCFullYear()}-${pad(time.getUTCMonth() + 1)}-${pad(time.getUTCDate())}` +
    `T${pad(time.getUTCHours())}:${pad(time.getUTCMinutes())}:${pad(time.getUTCSeconds())}+00:00`
  );
}
