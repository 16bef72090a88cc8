import type { RawFlag, RawQuantity } from '../inventory-snapshot';

const NUMERIC_PATTERN = /^[-+]?(\d+([.,]\d*)?|[.,]\d+)$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
const DAY_FIRST_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|\s)/;
const MS_PER_DAY = 86_400_000;

/**
 * Parses a raw quantity.
 * Returns null for missing values and NaN for malformed ones, so callers can
 * tell "treat as zero" apart from "reject the row".
 */
export function parseQuantity(value: RawQuantity | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : Number.NaN;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (!NUMERIC_PATTERN.test(trimmed)) {
    return Number.NaN;
  }

  return Number(trimmed.replace(',', '.'));
}

/** Clamps to a non-negative integer. */
export function toUnits(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }

  return Math.trunc(value);
}

export function parseFlag(value: RawFlag | undefined, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return value !== 0;
  }

  if (typeof value !== 'string') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'si', 's', 'yes', 'y'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'n'].includes(normalized)) {
    return false;
  }

  return fallback;
}

/**
 * Calendar day number (days since 1970-01-01) of a local date.
 */
export function toDayNumber(date: Date): number {
  return Math.floor(
    Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY,
  );
}

/**
 * Parses a movement date into a calendar day number.
 * Accepts Date instances, ISO `YYYY-MM-DD` (optionally followed by a time) and `DD/MM/YYYY`.
 */
export function parseMovementDay(value: Date | string | null | undefined): number | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toDayNumber(value);
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  const iso = ISO_DATE_PATTERN.exec(trimmed);
  if (iso) {
    return buildDayNumber(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = DAY_FIRST_DATE_PATTERN.exec(trimmed);
  if (dayFirst) {
    return buildDayNumber(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
}

function buildDayNumber(year: number, month: number, day: number): number | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  const timestamp = Date.UTC(year, month - 1, day);
  const check = new Date(timestamp);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return Math.floor(timestamp / MS_PER_DAY);
}
