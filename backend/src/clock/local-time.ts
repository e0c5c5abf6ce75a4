const DAY_MS = 86_400_000;

export interface LocalTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function toLocalParts(instant: Date, timeZone: string): LocalTimeParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year ?? 0,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
}

export function parseClockTime(value: string): { hour: number; minute: number } {
  const [hourText, minuteText] = value.split(":");
  return {hour: Number(hourText), minute: Number(minuteText)};
}

export function formatLocalTime(instant: Date, timeZone: string): string {
  const {hour, minute, second} = toLocalParts(instant, timeZone);
  return [hour, minute, second].map((value) => String(value).padStart(2, "0")).join(":");
}

const MINUTE_MS = 60_000;
const HALF_DAY_MS = 43_200_000;

/** The instant's local wall clock, read as if it were UTC. */
function wallClockMs(instant: number, timeZone: string): number {
  const parts = toLocalParts(new Date(instant), timeZone);
  return Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute);
}

/**
 * Resolves a wall-clock time on a given local date to an instant. A time that
 * occurs twice resolves to the earlier instant; a time skipped by a DST gap
 * resolves to the first minute after the gap.
 */
export function localDateTimeToInstant(
  date: Pick<LocalTimeParts, "year" | "month" | "day">,
  hour: number,
  minute: number,
  timeZone: string,
): Date {
  const wanted = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  const offsetBefore = wallClockMs(wanted - HALF_DAY_MS, timeZone) - (wanted - HALF_DAY_MS);
  const offsetAfter = wallClockMs(wanted + HALF_DAY_MS, timeZone) - (wanted + HALF_DAY_MS);
  const candidates = [wanted - offsetBefore, wanted - offsetAfter]
    .filter((candidate) => wallClockMs(candidate, timeZone) === wanted)
    .sort((a, b) => a - b);
  if (candidates.length) {
    return new Date(candidates[0]);
  }

  let before = Math.min(wanted - offsetBefore, wanted - offsetAfter);
  let after = Math.max(wanted - offsetBefore, wanted - offsetAfter);
  while (after - before > MINUTE_MS) {
    const middle = before + Math.floor((after - before) / 2 / MINUTE_MS) * MINUTE_MS;
    if (wallClockMs(middle, timeZone) >= wanted) {
      after = middle;
    } else {
      before = middle;
    }
  }
  return new Date(after);
}

export function startOfLocalDay(instant: Date, timeZone: string): Date {
  return localDateTimeToInstant(toLocalParts(instant, timeZone), 0, 0, timeZone);
}

/** First instant at or after `from` whose local wall clock reads `clockTime`. */
export function nextOccurrence(from: Date, clockTime: string, timeZone: string): Date {
  const {hour, minute} = parseClockTime(clockTime);
  const today = toLocalParts(from, timeZone);
  const candidate = localDateTimeToInstant(today, hour, minute, timeZone);
  if (candidate.getTime() >= from.getTime()) {
    return candidate;
  }
  const tomorrow = toLocalParts(new Date(from.getTime() + DAY_MS), timeZone);
  return localDateTimeToInstant(tomorrow, hour, minute, timeZone);
}
