import type { DecodeOptions } from './selector/decoder.js';
import type { SchemaIntrospector } from './selector/schema-guard.js';

export type Row = Record<string, unknown>;

export type AggregateFunction = 'count' | 'sum' | 'min' | 'max' | 'mean';

export interface SelectRequest {
  table: string;
  /** Columns to return; omitted or empty selects every column. */
  columns?: readonly string[];
  /** Selector in its wire form (`{ operator: { $and: [...] } }`). */
  selector?: unknown;
}

export type SelectOptions = DecodeOptions;

export interface TableStore extends SchemaIntrospector {
  select(request: SelectRequest, options?: SelectOptions): Promise<Row[]>;
  distinct(table: string, columns: readonly string[]): Promise<Row[]>;
  aggregate(table: string, fn: AggregateFunction, column?: string): Promise<unknown>;
  close(): Promise<void>;
}
