import { UnknownFieldError, UnknownTableError } from '../errors.js';
import type { CompiledFilter } from './types.js';

/** Catalog lookups supplied by the database layer. */
export interface SchemaIntrospector {
  allTables(): Promise<string[]>;
  columnsOf(table: string): Promise<string[]>;
}

/**
 * Rejects a compiled filter unless its table exists and every field it
 * references is a column of that table. Nothing may be executed when
 * `check` throws.
 */
export class SchemaGuard {
  constructor(private readonly introspector: SchemaIntrospector) {}

  async check<T extends CompiledFilter>(table: string, compiled: T, columns: readonly string[] = []): Promise<T> {
    await this.assertColumns(table, [...compiled.fields, ...columns]);
    return compiled;
  }

  async assertColumns(table: string, names: Iterable<string>): Promise<void> {
    const tables = await this.introspector.allTables();
    if (!tables.includes(table)) {
      throw new UnknownTableError(table);
    }

    const known = new Set(await this.introspector.columnsOf(table));
    const unknown = [...new Set(names)].filter((name) => !known.has(name)).sort();
    if (unknown.length > 0) {
      throw new UnknownFieldError(table, unknown);
    }
  }
}
