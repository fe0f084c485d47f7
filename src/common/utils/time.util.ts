import { InvalidReportRequestError } from '../errors';

// An ISO-8601 timestamp that carries its own offset (`Z` or `+hh:mm`).
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;
const DAY_LABEL = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface InstantWindow {
  start: Date;
  end: Date;
}

/**
 * Coerces a stored value into an absolute instant. Anything that cannot be
 * placed on the UTC timeline without guessing a zone yields null.
 */
export function toInstant(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string' && ZONED_ISO.test(value.trim())) {
    const parsed = new Date(value.trim());
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Offset of `timeZone` from UTC at `instant`, in milliseconds.
 */
export function zoneOffsetMs(timeZone: string, instant: Date): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };

  const asUtc = Date.UTC(
    field('year'),
    field('month') - 1,
    field('day'),
    field('hour'),
    field('minute'),
    field('second'),
  );
  const wholeSeconds = instant.getTime() - instant.getUTCMilliseconds();
  return asUtc - wholeSeconds;
}

/**
 * The instant at which local midnight of (year, month, day) occurs in `timeZone`.
 */
function localMidnight(year: number, month: number, day: number, timeZone: string): Date {
  const naive = Date.UTC(year, month - 1, day);
  let instant = naive - zoneOffsetMs(timeZone, new Date(naive));
  // The offset at the guess can differ from the offset at the result across a DST change.
  const corrected = naive - zoneOffsetMs(timeZone, new Date(instant));
  if (corrected !== instant) {
    instant = corrected;
  }
  return new Date(instant);
}

/**
 * Half-open [start, end) window covering the calendar day `label` (YYYY-MM-DD)
 * as observed in `timeZone`.
 */
export function zonedDayWindow(label: string, timeZone: string): InstantWindow {
  const match = DAY_LABEL.exec(label);
  if (!match) {
    throw new InvalidReportRequestError(`Day label must be YYYY-MM-DD, got "${label}"`, { label });
  }
  if (!isValidTimeZone(timeZone)) {
    throw new InvalidReportRequestError(`Unknown timezone "${timeZone}"`, { timeZone });
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidReportRequestError(`Not a calendar day: "${label}"`, { label });
  }

  const next = new Date(Date.UTC(year, month - 1, day + 1));
  return {
    start: localMidnight(year, month, day, timeZone),
    end: localMidnight(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate(), timeZone),
  };
}

/**
 * The YYYY-MM-DD label of `instant` in `timeZone`.
 */
export function zonedDayLabel(instant: Date, timeZone: string): string {
  const shifted = new Date(instant.getTime() + zoneOffsetMs(timeZone, instant));
  return shifted.toISOString().slice(0, 10);
}

/**
 * Label of the local day before the one containing `now`.
 */
export function previousZonedDay(now: Date, timeZone: string): string {
  const today = zonedDayWindow(zonedDayLabel(now, timeZone), timeZone);
  return zonedDayLabel(new Date(today.start.getTime() - 1), timeZone);
}
