/**
 * Text normalization used as join keys across the inventory engine.
 *
 * Store names and item codes arrive from spreadsheets exported by different
 * systems, so every comparison goes through one of these functions instead of
 * comparing raw strings.
 */

/**
 * Canonical key for store names (registry joins, origin-store filters):
 * - Removes diacritics/accents (e.g., "Bogotá" -> "bogota")
 * - Converts to lowercase
 * - Collapses any run of whitespace into a single space
 * - Trims leading/trailing whitespace
 *
 * Null and undefined normalize to an empty string.
 */
export function normalizeStoreKey(value: string | null | undefined): string {
  if (typeof value !== 'string') {
    return '';
  }

  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Item codes (barcodes) are case-insensitive: trimmed and upper-cased.
 */
export function normalizeItemCode(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  return String(value).trim().toUpperCase();
}

/**
 * Upper-cased, trimmed label used for brand comparisons and policy matching.
 */
export function normalizeLabel(value: string | null | undefined): string {
  return typeof value === 'string' ? value.trim().toUpperCase() : '';
}
