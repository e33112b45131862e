import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { UnknownTableError } from '../../errors.js';
import type { TableStore } from '../../types.js';

const tableParams = z.object({ table: z.string().min(1) });

const aggregateParams = tableParams.extend({
  fn: z.enum(['count', 'sum', 'min', 'max', 'mean']),
});

const columnList = z
  .string()
  .transform((value) => value.split(',').map((column) => column.trim()).filter((column) => column !== ''))
  .pipe(z.array(z.string()).min(1, 'at least one column is required'));

export async function registerTableRoutes(app: FastifyInstance, store: TableStore): Promise<void> {
  // GET /tables — table names of the public schema
  app.get('/tables', async (_request, reply) => {
    const tables = await store.allTables();
    return reply.status(200).send({ tables });
  });

  // GET /tables/:table/columns — column names, 404 for an unknown table
  app.get('/tables/:table/columns', async (request, reply) => {
    const { table } = tableParams.parse(request.params);
    const tables = await store.allTables();
    if (!tables.includes(table)) {
      throw new UnknownTableError(table);
    }
    const columns = await store.columnsOf(table);
    return reply.status(200).send({ table, columns });
  });

  // GET /tables/:table/distinct?columns=a,b
  app.get('/tables/:table/distinct', async (request, reply) => {
    const { table } = tableParams.parse(request.params);
    const { columns } = z.object({ columns: columnList }).parse(request.query);
    const rows = await store.distinct(table, columns);
    return reply.status(200).send({ rows });
  });

  // GET /tables/:table/aggregate/:fn?column=x
  app.get('/tables/:table/aggregate/:fn', async (request, reply) => {
    const { table, fn } = aggregateParams.parse(request.params);
    const { column } = z.object({ column: z.string().min(1).optional() }).parse(request.query);
    const value = await store.aggregate(table, fn, column);
    return reply.status(200).send({ table, fn, column: column ?? null, value });
  });
}
