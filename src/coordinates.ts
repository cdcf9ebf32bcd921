import { CoordinateSpan } from './types.js';

// Where a hit's alignment body ends: the next local-id hit header or the statistics footer
const HIT_BOUNDARY_PATTERN = />lcl|Lambda/;

// Alignment row reporting subject coordinates, e.g. "Sbjct: 120  ACGTACGT  127"
const SBJCT_ROW_PATTERN = /Sbjct/;

/**
 * Find the subject coordinate span of the hit whose header sits at
 * `headerLineNumber` (1-based) in `lines`.
 *
 * Only rows strictly between the header and the hit boundary are considered.
 * A report with no boundary after the header is scanned to its end.
 * Returns undefined when the hit has no Sbjct rows.
 */
export function scanHitCoordinates(
  lines: readonly string[],
  headerLineNumber: number
): CoordinateSpan | undefined {
  let span: CoordinateSpan | undefined;
  // The header is at index headerLineNumber - 1, so the hit body starts at headerLineNumber
  for (let i = headerLineNumber; i < lines.length; i++) {
    const line = lines[i];
    if (HIT_BOUNDARY_PATTERN.test(line)) {
      break;
    }
    if (!SBJCT_ROW_PATTERN.test(line)) {
      continue;
    }
    for (const value of rowCoordinates(line)) {
      span = span
        ? { min: Math.min(span.min, value), max: Math.max(span.max, value) }
        : { min: value, max: value };
    }
  }
  return span;
}

/**
 * Start and end coordinates of one Sbjct row: the second field and the last.
 * Fields that are not integers are left out.
 */
export function rowCoordinates(row: string): number[] {
  const fields = row.trim().split(/\s+/);
  if (fields.length < 2) {
    return [];
  }
  return [fields[1], fields[fields.length - 1]]
    .map(field => parseInt(field, 10))
    .filter(value => !Number.isNaN(value));
}
