import type { IsoDate } from '../types/clinical';

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Converts a `YYYY-MM-DD` string to a UTC day number.
 * Returns null for malformed or impossible dates (e.g. 2024-02-30).
 */
export function toDayNumber(value: string): number | null {
  const match = ISO_DATE_REGEX.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);

  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return Math.round(time / MS_PER_DAY);
}

export function isIsoDate(value: unknown): value is IsoDate {
  return typeof value === 'string' && toDayNumber(value) !== null;
}

function dayNumberOrThrow(value: IsoDate): number {
  const dayNumber = toDayNumber(value);
  if (dayNumber === null) {
    throw new RangeError(`Invalid ISO date: ${value}`);
  }
  return dayNumber;
}

/** Signed number of days from `from` to `to`. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return dayNumberOrThrow(to) - dayNumberOrThrow(from);
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  return dayNumberOrThrow(a) - dayNumberOrThrow(b);
}

export function maxIsoDate(a: IsoDate, b: IsoDate): IsoDate {
  return compareIsoDates(a, b) >= 0 ? a : b;
}

export function minIsoDate(a: IsoDate, b: IsoDate): IsoDate {
  return compareIsoDates(a, b) <= 0 ? a : b;
}
