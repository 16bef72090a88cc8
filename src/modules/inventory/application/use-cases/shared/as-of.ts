const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Resolves the day the sales windows end on. An ISO day is read as a local
 * calendar day so the window does not shift with the process timezone.
 */
export function resolveAsOf(value: string | undefined, now: () => Date = () => new Date()): Date {
  if (!value) {
    return now();
  }

  const match = ISO_DAY_PATTERN.exec(value.trim());
  if (match) {
    return new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? now() : parsed;
}

/** `YYYY-MM-DD` of a local date. */
export function formatDay(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}
