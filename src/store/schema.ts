import type { AggregateFunction } from '../types.js';

export const SQL_LIST_TABLES = `
SELECT table_name
  FROM information_schema.tables
 WHERE table_schema = 'public'
   AND table_type = 'BASE TABLE'
 ORDER BY table_name
`.trim();

export const SQL_LIST_COLUMNS = `
SELECT column_name
  FROM information_schema.columns
 WHERE table_schema = 'public'
   AND table_name = $1
 ORDER BY ordinal_position
`.trim();

export const AGGREGATE_SQL: Readonly<Record<AggregateFunction, string>> = {
  count: 'COUNT',
  sum: 'SUM',
  min: 'MIN',
  max: 'MAX',
  mean: 'AVG',
};

/** Double-quotes an identifier that has already been checked against the catalog. */
export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}
