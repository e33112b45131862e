import pg from 'pg';
import type { BaseLogger } from 'pino';
import { TableStoreError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import { compileSelector } from '../selector/compiler.js';
import { decodeSelector } from '../selector/decoder.js';
import { toPositional } from '../selector/positional.js';
import { SchemaGuard } from '../selector/schema-guard.js';
import type { AggregateFunction, Row, SelectOptions, SelectRequest, TableStore } from '../types.js';
import { AGGREGATE_SQL, SQL_LIST_COLUMNS, SQL_LIST_TABLES, quoteIdentifier } from './schema.js';
import { mapNumeric } from './row-mapper.js';

export interface TableStoreConfig {
  pool: pg.Pool;
  /** Default for SelectOptions.strict. */
  strictSelectors?: boolean;
  logger?: BaseLogger;
}

export class PostgresTableStore implements TableStore {
  private readonly pool: pg.Pool;
  private readonly strictSelectors: boolean;
  private readonly logger: BaseLogger;
  private readonly guard: SchemaGuard;

  constructor(config: TableStoreConfig) {
    this.pool = config.pool;
    this.strictSelectors = config.strictSelectors ?? false;
    this.logger = config.logger ?? defaultLogger;
    this.guard = new SchemaGuard(this);
  }

  async allTables(): Promise<string[]> {
    const result = await this.run<{ table_name: string }>('list tables', SQL_LIST_TABLES, []);
    return result.rows.map((row) => row.table_name);
  }

  async columnsOf(table: string): Promise<string[]> {
    const result = await this.run<{ column_name: string }>('list columns', SQL_LIST_COLUMNS, [table]);
    return result.rows.map((row) => row.column_name);
  }

  /**
   * Runs `SELECT <columns> FROM <table> [WHERE <selector>]`. The selector is
   * compiled and checked against the catalog first; an unknown table or
   * field rejects the request before any row is read.
   */
  async select(request: SelectRequest, options: SelectOptions = {}): Promise<Row[]> {
    const columns = request.columns ?? [];
    const selector = decodeSelector(request.selector, {
      strict: options.strict ?? this.strictSelectors,
      logger: options.logger ?? this.logger,
    });
    const compiled = await this.guard.check(
      request.table,
      compileSelector(selector, { identifier: quoteIdentifier }),
      columns,
    );
    const { text, values } = toPositional(compiled.sql, compiled.params);

    const projection = columns.length > 0 ? columns.map(quoteIdentifier).join(', ') : '*';
    const sql = [
      `SELECT ${projection}`,
      `FROM ${quoteIdentifier(request.table)}`,
      ...(text === '' ? [] : [`WHERE ${text}`]),
    ].join('\n');

    const result = await this.run<Row>('select rows', sql, values);
    return result.rows;
  }

  async distinct(table: string, columns: readonly string[]): Promise<Row[]> {
    if (columns.length === 0) {
      throw new TableStoreError('distinct requires at least one column');
    }
    await this.guard.assertColumns(table, columns);
    const sql = [
      `SELECT DISTINCT ${columns.map(quoteIdentifier).join(', ')}`,
      `FROM ${quoteIdentifier(table)}`,
    ].join('\n');
    const result = await this.run<Row>('select distinct rows', sql, []);
    return result.rows;
  }

  /**
   * `count` without a column counts rows; the numeric aggregates come back
   * as numbers (null over an empty table), min/max keep the column's type.
   */
  async aggregate(table: string, fn: AggregateFunction, column?: string): Promise<unknown> {
    if (column === undefined && fn !== 'count') {
      throw new TableStoreError(`${fn} requires a column`);
    }
    await this.guard.assertColumns(table, column === undefined ? [] : [column]);

    const target = column === undefined ? '*' : quoteIdentifier(column);
    const sql = [
      `SELECT ${AGGREGATE_SQL[fn]}(${target}) AS value`,
      `FROM ${quoteIdentifier(table)}`,
    ].join('\n');
    const result = await this.run<{ value: unknown }>(`aggregate ${fn}`, sql, []);
    const value = result.rows[0]?.value ?? null;
    return fn === 'min' || fn === 'max' ? value : mapNumeric(value);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<R extends pg.QueryResultRow>(
    action: string,
    sql: string,
    values: unknown[],
  ): Promise<pg.QueryResult<R>> {
    this.logger.debug({ sql, values: values.length }, action);
    try {
      return await this.pool.query<R>(sql, values);
    } catch (err) {
      throw new TableStoreError(`Failed to ${action}: ${String(err)}`, err);
    }
  }
}
