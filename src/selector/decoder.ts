import type { BaseLogger } from 'pino';
import { SelectorValidationError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import { comparisonFromSentinel, connectiveFromSentinel } from './operators.js';
import type { Comparison, Connective, FilterNode, Scalar, Selector } from './types.js';

export interface DecodeOptions {
  /** Throw SelectorValidationError instead of dropping what cannot be compiled. */
  strict?: boolean;
  logger?: BaseLogger;
}

interface DecodeContext {
  strict: boolean;
  logger: BaseLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Records a part of the tree that cannot be compiled. Lenient decoding drops
 * it with a debug line; strict decoding rejects the whole selector.
 */
function degrade(ctx: DecodeContext, path: string, reason: string): void {
  if (ctx.strict) {
    throw new SelectorValidationError(path, reason);
  }
  ctx.logger.debug({ path, reason }, 'selector fragment dropped');
}

function decodeStatement(raw: unknown, path: string, ctx: DecodeContext): FilterNode | null {
  if (!isRecord(raw)) {
    degrade(ctx, path, `statement must be an object, got ${typeName(raw)}`);
    return null;
  }

  const comparisons: Comparison[] = [];
  const fields: string[] = [];
  for (const [field, conditions] of Object.entries(raw)) {
    // Kept even when every comparison is dropped, so the schema guard still sees it
    fields.push(field);
    const fieldPath = `${path}.${field}`;
    if (!isRecord(conditions)) {
      degrade(ctx, fieldPath, `conditions must be an object, got ${typeName(conditions)}`);
      continue;
    }
    for (const [sentinel, value] of Object.entries(conditions)) {
      const operator = comparisonFromSentinel(sentinel);
      if (operator === undefined) {
        degrade(ctx, `${fieldPath}.${sentinel}`, `unsupported operator '${sentinel}'`);
        continue;
      }
      if (!isScalar(value)) {
        degrade(ctx, `${fieldPath}.${sentinel}`, `unsupported value of type ${typeName(value)}`);
        continue;
      }
      comparisons.push({ field, operator, value });
    }
  }

  return { kind: 'statement', comparisons, fields };
}

function decodeOperator(raw: unknown, path: string, ctx: DecodeContext): FilterNode | null {
  if (!isRecord(raw)) {
    degrade(ctx, path, `operator must be an object, got ${typeName(raw)}`);
    return null;
  }

  const recognised: Array<[string, Connective]> = [];
  for (const key of Object.keys(raw)) {
    const connective = connectiveFromSentinel(key);
    if (connective === undefined) {
      degrade(ctx, `${path}.${key}`, `unsupported connective '${key}'`);
    } else {
      recognised.push([key, connective]);
    }
  }

  const [first, ...extra] = recognised;
  if (first === undefined) {
    degrade(ctx, path, 'operator carries no connective');
    return null;
  }
  if (extra.length > 0) {
    degrade(ctx, path, `operator carries several connectives: ${recognised.map(([key]) => key).join(', ')}`);
    return null;
  }

  const [sentinel, connective] = first;
  const items = raw[sentinel];
  const childPath = `${path}.${sentinel}`;
  if (!Array.isArray(items)) {
    degrade(ctx, childPath, `children must be an array, got ${typeName(items)}`);
    return null;
  }

  const children: FilterNode[] = [];
  items.forEach((item: unknown, index) => {
    const child = decodeNode(item, `${childPath}[${index}]`, ctx);
    if (child !== null) children.push(child);
  });
  return { kind: connective, children };
}

function decodeNode(raw: unknown, path: string, ctx: DecodeContext): FilterNode | null {
  if (!isRecord(raw)) {
    degrade(ctx, path, `node must be an object, got ${typeName(raw)}`);
    return null;
  }

  // A node that declares both takes the operator path; its statement is ignored.
  if ('operator' in raw) {
    if ('statement' in raw) {
      degrade(ctx, `${path}.statement`, 'statement ignored next to operator');
    }
    return decodeOperator(raw['operator'], `${path}.operator`, ctx);
  }
  if ('statement' in raw) {
    return decodeStatement(raw['statement'], `${path}.statement`, ctx);
  }

  if (Object.keys(raw).length > 0 || path !== '$') {
    degrade(ctx, path, 'node carries neither statement nor operator');
  }
  return null;
}

/**
 * Decodes the wire form of a selector (`$eq`/`$and` sentinels) into a typed
 * filter tree. The caller's object is only read, never kept.
 *
 * @example
 * decodeSelector({ operator: { $and: [
 *   { statement: { age: { $gte: 18 } } },
 *   { statement: { country: { $eq: 'Germany' } } },
 * ] } });
 */
export function decodeSelector(raw: unknown, options: DecodeOptions = {}): Selector {
  const ctx: DecodeContext = {
    strict: options.strict ?? false,
    logger: options.logger ?? defaultLogger,
  };
  if (raw === undefined || raw === null) {
    return null;
  }
  return decodeNode(raw, '$', ctx);
}
