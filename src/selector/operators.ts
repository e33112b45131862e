import type { ComparisonOperator, Connective } from './types.js';

export const COMPARISON_SENTINELS: Readonly<Record<string, ComparisonOperator>> = {
  $eq: 'eq',
  $ne: 'ne',
  $lt: 'lt',
  $lte: 'lte',
  $gt: 'gt',
  $gte: 'gte',
};

export const CONNECTIVE_SENTINELS: Readonly<Record<string, Connective>> = {
  $and: 'and',
  $or: 'or',
};

export const SQL_OPERATORS: Readonly<Record<ComparisonOperator, string>> = {
  eq: '=',
  ne: '!=',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
};

export const CONNECTIVE_JOINERS: Readonly<Record<Connective, string>> = {
  and: ' AND ',
  or: ' OR ',
};

export function comparisonFromSentinel(key: string): ComparisonOperator | undefined {
  return Object.hasOwn(COMPARISON_SENTINELS, key) ? COMPARISON_SENTINELS[key] : undefined;
}

export function connectiveFromSentinel(key: string): Connective | undefined {
  return Object.hasOwn(CONNECTIVE_SENTINELS, key) ? CONNECTIVE_SENTINELS[key] : undefined;
}

/**
 * Derives the bind-parameter name for a field. Anything outside
 * `[A-Za-z0-9_]` becomes `_`, so `address.city` binds as `address_city` and
 * `e-mail` as `e_mail`; a leading digit gets a `_` prefix.
 */
export function placeholderFor(field: string): string {
  const name = field.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(name) || name === '' ? `_${name}` : name;
}
