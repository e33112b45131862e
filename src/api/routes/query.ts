import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { SelectOptions, TableStore } from '../../types.js';

export const queryBodySchema = z.object({
  query_table: z.string().min(1),
  query_columns: z.array(z.string().min(1)).optional(),
  // Decoded by the store; only the outer shape is checked here
  selector: z.record(z.unknown()),
});

export async function registerQueryRoutes(
  app: FastifyInstance,
  store: TableStore,
  strictSelectors?: boolean,
): Promise<void> {
  // POST /query — filtered rows of one table
  app.post('/query', async (request, reply) => {
    const body = queryBodySchema.parse(request.body);
    // Without a server-wide setting the store's own default applies
    const options: SelectOptions = strictSelectors === undefined
      ? { logger: request.log }
      : { strict: strictSelectors, logger: request.log };
    const rows = await store.select(
      { table: body.query_table, columns: body.query_columns ?? [], selector: body.selector },
      options,
    );
    return reply.status(200).send({ rows });
  });
}
