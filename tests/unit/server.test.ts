import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/api/server.js';
import { compileSelector } from '../../src/selector/compiler.js';
import { decodeSelector } from '../../src/selector/decoder.js';
import { SchemaGuard } from '../../src/selector/schema-guard.js';
import { TableStoreError } from '../../src/errors.js';
import type { CompiledFilter } from '../../src/selector/types.js';
import type { AggregateFunction, Row, SelectOptions, SelectRequest, TableStore } from '../../src/types.js';

const API_KEY = 'test-secret';

/**
 * In-memory stand-in for PostgresTableStore: same decode/compile/guard path,
 * but returns the stored rows instead of running SQL.
 */
class InMemoryTableStore implements TableStore {
  readonly compiled: CompiledFilter[] = [];
  readonly selectOptions: SelectOptions[] = [];
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  failWith: Error | null = null;
  private readonly guard = new SchemaGuard(this);

  constructor(private readonly tables: Record<string, { columns: string[]; rows: Row[] }>) {}

  async allTables(): Promise<string[]> {
    if (this.failWith !== null) throw this.failWith;
    return Object.keys(this.tables);
  }

  async columnsOf(table: string): Promise<string[]> {
    return this.tables[table]?.columns ?? [];
  }

  async select(request: SelectRequest, options: SelectOptions = {}): Promise<Row[]> {
    this.selectOptions.push(options);
    const selector = decodeSelector(request.selector, options);
    const compiled = await this.guard.check(request.table, compileSelector(selector), request.columns);
    this.compiled.push(compiled);
    return this.tables[request.table]?.rows ?? [];
  }

  async distinct(table: string, columns: readonly string[]): Promise<Row[]> {
    this.calls.push({ method: 'distinct', args: [table, columns] });
    await this.guard.assertColumns(table, columns);
    return this.tables[table]?.rows ?? [];
  }

  async aggregate(table: string, fn: AggregateFunction, column?: string): Promise<unknown> {
    this.calls.push({ method: 'aggregate', args: [table, fn, column] });
    await this.guard.assertColumns(table, column === undefined ? [] : [column]);
    return this.tables[table]?.rows.length ?? 0;
  }

  async close(): Promise<void> {}
}

function makeStore() {
  return new InMemoryTableStore({
    users: {
      columns: ['name', 'age'],
      rows: [{ name: 'Ada', age: 36 }, { name: 'Linus', age: 28 }],
    },
  });
}

const auth = { 'x-api-key': API_KEY };

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

function start(store: TableStore, strictSelectors?: boolean): FastifyInstance {
  app = buildServer(
    store,
    strictSelectors === undefined
      ? { apiKey: API_KEY, logLevel: false }
      : { apiKey: API_KEY, strictSelectors, logLevel: false },
  );
  return app;
}

describe('API key authentication', () => {
  it('rejects a request without a key', async () => {
    const res = await start(makeStore()).inject({ method: 'GET', url: '/api/v1/tables' });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'AuthenticationError', message: 'Missing or invalid API key' });
  });

  it('rejects a wrong key', async () => {
    const res = await start(makeStore()).inject({
      method: 'GET',
      url: '/api/v1/tables',
      headers: { 'x-api-key': 'wrong' },
    });
    expect(res.statusCode).toBe(401);
  });
});

describe('GET /api/v1/tables', () => {
  it('lists tables', async () => {
    const res = await start(makeStore()).inject({ method: 'GET', url: '/api/v1/tables', headers: auth });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ tables: ['users'] });
  });

  it('maps store failures to 500 without leaking details', async () => {
    const store = makeStore();
    store.failWith = new TableStoreError('Failed to list tables: boom');
    const res = await start(store).inject({ method: 'GET', url: '/api/v1/tables', headers: auth });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'InternalError', message: 'Internal server error' });
  });
});

describe('GET /api/v1/tables/:table/columns', () => {
  it('returns the columns of a table', async () => {
    const res = await start(makeStore()).inject({ method: 'GET', url: '/api/v1/tables/users/columns', headers: auth });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ table: 'users', columns: ['name', 'age'] });
  });

  it('404 for an unknown table', async () => {
    const res = await start(makeStore()).inject({ method: 'GET', url: '/api/v1/tables/orders/columns', headers: auth });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: 'UnknownTableError',
      message: "Table 'orders' does not exist",
      table: 'orders',
    });
  });
});

describe('POST /api/v1/query', () => {
  it('compiles the selector and returns rows', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: {
        query_table: 'users',
        query_columns: ['name'],
        selector: {
          operator: {
            $or: [
              { statement: { age: { $gte: 30 } } },
              { statement: { name: { $eq: 'Linus' } } },
            ],
          },
        },
      },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ rows: [{ name: 'Ada', age: 36 }, { name: 'Linus', age: 28 }] });
    expect(store.compiled[0]?.sql).toBe('(age >= :age) OR (name = :name)');
    expect(store.compiled[0]?.params).toEqual({ age: 30, name: 'Linus' });
  });

  it('400 when the selector references a missing column', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users', selector: { statement: { country: { $eq: 'Germany' } } } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'UnknownFieldError',
      message: "Unknown field(s) for table 'users': country",
      fields: ['country'],
    });
    expect(store.compiled).toHaveLength(0);
  });

  it('404 for an unknown table', async () => {
    const res = await start(makeStore()).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'orders', selector: {} },
    });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: 'UnknownTableError', table: 'orders' });
  });

  it('400 for a body without a selector', async () => {
    const res = await start(makeStore()).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users' },
    });
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe('ValidationError');
    expect(body.issues).toEqual([{ path: 'selector', message: 'Required' }]);
  });

  it('strict server rejects unsupported operators', async () => {
    const res = await start(makeStore(), true).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users', selector: { statement: { age: { $in: [1, 2] } } } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'SelectorValidationError',
      message: "Invalid selector at $.statement.age.$in: unsupported operator '$in'",
      path: '$.statement.age.$in',
    });
  });

  it('leaves the strict default to the store when the server sets none', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users', selector: {} },
    });
    expect(res.statusCode).toBe(200);
    expect(store.selectOptions).toHaveLength(1);
    expect(Object.hasOwn(store.selectOptions[0] ?? {}, 'strict')).toBe(false);
  });

  it('passes the server strict setting to the store', async () => {
    const store = makeStore();
    await start(store, false).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users', selector: {} },
    });
    expect(store.selectOptions[0]?.strict).toBe(false);
  });

  it('lenient server drops unsupported operators', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: auth,
      payload: { query_table: 'users', selector: { statement: { age: { $in: [1, 2], $lt: 40 } } } },
    });
    expect(res.statusCode).toBe(200);
    expect(store.compiled[0]?.sql).toBe('(age < :age)');
  });
});

describe('GET /api/v1/tables/:table/distinct', () => {
  it('splits the column list', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'GET',
      url: '/api/v1/tables/users/distinct?columns=name,%20age',
      headers: auth,
    });
    expect(res.statusCode).toBe(200);
    expect(store.calls).toEqual([{ method: 'distinct', args: ['users', ['name', 'age']] }]);
  });

  it('400 without columns', async () => {
    const res = await start(makeStore()).inject({
      method: 'GET',
      url: '/api/v1/tables/users/distinct?columns=',
      headers: auth,
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('ValidationError');
  });
});

describe('GET /api/v1/tables/:table/aggregate/:fn', () => {
  it('returns the aggregate value', async () => {
    const store = makeStore();
    const res = await start(store).inject({
      method: 'GET',
      url: '/api/v1/tables/users/aggregate/count',
      headers: auth,
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ table: 'users', fn: 'count', column: null, value: 2 });
  });

  it('passes the column through', async () => {
    const store = makeStore();
    await start(store).inject({ method: 'GET', url: '/api/v1/tables/users/aggregate/max?column=age', headers: auth });
    expect(store.calls).toEqual([{ method: 'aggregate', args: ['users', 'max', 'age'] }]);
  });

  it('400 for an unsupported function', async () => {
    const res = await start(makeStore()).inject({
      method: 'GET',
      url: '/api/v1/tables/users/aggregate/median',
      headers: auth,
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('ValidationError');
  });

  it('400 for an unknown column', async () => {
    const res = await start(makeStore()).inject({
      method: 'GET',
      url: '/api/v1/tables/users/aggregate/sum?column=salary',
      headers: auth,
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().fields).toEqual(['salary']);
  });
});
