import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { AuthenticationError } from '../../errors.js';

export const API_KEY_HEADER = 'x-api-key';

function keysMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Rejects every request of the instance whose `x-api-key` header does not
 * equal the configured key.
 */
export function registerApiKeyAuth(app: FastifyInstance, apiKey: string): void {
  app.addHook('onRequest', async (request) => {
    const header = request.headers[API_KEY_HEADER];
    const given = Array.isArray(header) ? header[0] : header;
    if (given === undefined || !keysMatch(given, apiKey)) {
      throw new AuthenticationError();
    }
  });
}
