import { CONNECTIVE_JOINERS, SQL_OPERATORS, placeholderFor } from './operators.js';
import type {
  CompiledFilter,
  CompileOptions,
  FilterNode,
  OperatorNode,
  Params,
  Selector,
  StatementNode,
} from './types.js';

/**
 * Per-call state threaded through the recursion. Each compile call owns a
 * fresh one, so nothing is shared between calls.
 */
interface Accumulator {
  params: Params;
  fields: Set<string>;
  /** Field to placeholder name; two different fields never share a name. */
  placeholders: Map<string, string>;
  identifier: (field: string) => string;
}

function newAccumulator(options: CompileOptions): Accumulator {
  return {
    params: {},
    fields: new Set<string>(),
    placeholders: new Map<string, string>(),
    identifier: options.identifier ?? ((field) => field),
  };
}

function bind(acc: Accumulator, name: string, value: Params[string]): void {
  // defineProperty keeps a field named `__proto__` an ordinary key
  Object.defineProperty(acc.params, name, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * The same field always gets the same placeholder. A different field whose
 * name sanitises to one already taken (`e-mail` after `e_mail`) gets a
 * numbered one instead: `e_mail_2`.
 */
function placeholderOf(acc: Accumulator, field: string): string {
  const known = acc.placeholders.get(field);
  if (known !== undefined) return known;

  const taken = new Set(acc.placeholders.values());
  const base = placeholderFor(field);
  let name = base;
  for (let n = 2; taken.has(name); n += 1) {
    name = `${base}_${n}`;
  }
  acc.placeholders.set(field, name);
  return name;
}

/**
 * Renders a statement's comparisons joined by AND. Every comparison on a
 * field binds to the same placeholder, so for `{ age: { $gte: 18, $lte: 30 } }`
 * the SQL shows both bounds while `params.age` holds the last value (30).
 */
function compileStatementNode(node: StatementNode, acc: Accumulator): string {
  for (const field of node.fields ?? []) acc.fields.add(field);
  const parts: string[] = [];
  for (const { field, operator, value } of node.comparisons) {
    acc.fields.add(field);
    const placeholder = placeholderOf(acc, field);
    bind(acc, placeholder, value);
    parts.push(`${acc.identifier(field)} ${SQL_OPERATORS[operator]} :${placeholder}`);
  }
  return parts.join(' AND ');
}

/**
 * Renders an AND/OR group: each non-empty child in parentheses, joined by
 * the connective. No outer parentheses; the parent adds them.
 */
function compileOperatorNode(node: OperatorNode, acc: Accumulator): string {
  const parts: string[] = [];
  for (const child of node.children) {
    const sql = compileNode(child, acc);
    if (sql !== '') parts.push(`(${sql})`);
  }
  return parts.join(CONNECTIVE_JOINERS[node.kind]);
}

function compileNode(node: FilterNode, acc: Accumulator): string {
  if (node.kind === 'statement') {
    return compileStatementNode(node, acc);
  }
  return compileOperatorNode(node, acc);
}

/**
 * Compiles a single statement into `field op :placeholder` comparisons
 * joined by AND, without surrounding parentheses.
 */
export function compileStatement(statement: StatementNode, options: CompileOptions = {}): CompiledFilter {
  const acc = newAccumulator(options);
  const sql = compileStatementNode(statement, acc);
  return { sql, params: acc.params, fields: acc.fields };
}

/**
 * Compiles a selector into a parameterized boolean expression.
 *
 * - `null` compiles to `''` with no params.
 * - A statement root is wrapped in parentheses: `(age = :age)`.
 * - An operator root joins its parenthesized children:
 *   `(age >= :age) AND (country = :country)`.
 *
 * Values never reach the SQL text; they are returned in `params`, keyed by
 * placeholder name. Later bindings of the same placeholder overwrite earlier ones.
 */
export function compileSelector(selector: Selector, options: CompileOptions = {}): CompiledFilter {
  const acc = newAccumulator(options);
  if (selector === null) {
    return { sql: '', params: acc.params, fields: acc.fields };
  }

  const sql = selector.kind === 'statement'
    ? compileStatementNode(selector, acc)
    : compileOperatorNode(selector, acc);

  if (sql === '') {
    return { sql: '', params: acc.params, fields: acc.fields };
  }
  return {
    sql: selector.kind === 'statement' ? `(${sql})` : sql,
    params: acc.params,
    fields: acc.fields,
  };
}

/**
 * Stateful wrapper over compileStatement/compileSelector that remembers every
 * field it has seen. One instance per logical compile; it is not meant to be
 * shared between concurrent requests.
 */
export class FilterCompiler {
  private readonly _fields = new Set<string>();

  constructor(private readonly options: CompileOptions = {}) {}

  compileStatement(statement: StatementNode): Pick<CompiledFilter, 'sql' | 'params'> {
    return this.record(compileStatement(statement, this.options));
  }

  compileSelector(selector: Selector): Pick<CompiledFilter, 'sql' | 'params'> {
    return this.record(compileSelector(selector, this.options));
  }

  /** Every field observed since construction. */
  fields(): ReadonlySet<string> {
    return new Set(this._fields);
  }

  private record({ sql, params, fields }: CompiledFilter): Pick<CompiledFilter, 'sql' | 'params'> {
    for (const field of fields) this._fields.add(field);
    return { sql, params };
  }
}
