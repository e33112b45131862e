import type { Params, Scalar } from './types.js';

export interface PositionalQuery {
  text: string;
  values: Scalar[];
}

// Quoted identifiers are matched first and passed through untouched. `(?<!:)`
// keeps `::type` casts out; the name must be a key of params to be rewritten.
const NAMED_PLACEHOLDER = /"(?:[^"]|"")*"|(?<!:):([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Rewrites `:name` placeholders into pg's `$n` form. A name seen twice reuses
 * its first index, so `age >= :age AND age <= :age` becomes
 * `age >= $1 AND age <= $1` with a single value.
 *
 * @param offset - number of values that precede these in the caller's list
 */
export function toPositional(sql: string, params: Params, offset: number = 0): PositionalQuery {
  const indexes = new Map<string, number>();
  const values: Scalar[] = [];

  const text = sql.replace(NAMED_PLACEHOLDER, (token: string, name: string | undefined) => {
    if (name === undefined || !Object.hasOwn(params, name)) return token;
    let index = indexes.get(name);
    if (index === undefined) {
      const value = params[name];
      if (value === undefined) return token;
      values.push(value);
      index = offset + values.length;
      indexes.set(name, index);
    }
    return `$${index}`;
  });

  return { text, values };
}
