/**
 * Date helpers shared by the lookup clients and the report printer.
 */

// YYYY-MM-DD, "YYYY-MM-DD HH:MM:SS", "YYYY-MM-DDTHH:MM:SSZ", "YYYY-MM-DDTHH:MM:SS+HH:MM"
const ACCEPTED_FORMATS: RegExp[] = [
  /^(\d{4})-(\d{2})-(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2}) \d{2}:\d{2}:\d{2}$/,
  /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}:\d{2}Z$/,
  /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}:\d{2}[+-]\d{2}:?\d{2}$/,
];

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay;
}

/**
 * Reduce a registry timestamp to `YYYY-MM-DD`.
 *
 * The calendar date is taken as written, so an offset timestamp keeps its
 * local date. Strings in no known format come back unchanged.
 */
export function normalizeDate(value: Date | string | null | undefined): string | null {
  if (value == null) {
    return null;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return value.toISOString().slice(0, 10);
  }

  const trimmed = value.trim();
  for (const format of ACCEPTED_FORMATS) {
    const match = format.exec(trimmed);
    if (!match) {
      continue;
    }
    const year = Number.parseInt(match[1], 10);
    const month = Number.parseInt(match[2], 10);
    const day = Number.parseInt(match[3], 10);
    if (isCalendarDate(year, month, day)) {
      return `${match[1]}-${match[2]}-${match[3]}`;
    }
  }
  return value;
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalDateTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}
