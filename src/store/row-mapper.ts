/**
 * pg hands back BIGINT and NUMERIC aggregates as strings. Converts those to
 * numbers and keeps null (an empty SUM/AVG) as null.
 */
export function mapNumeric(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

