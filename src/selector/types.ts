export type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'lte' | 'gt' | 'gte';

export type Connective = 'and' | 'or';

/** Bound values are plain scalars; null, booleans and arrays are not representable. */
export type Scalar = string | number;

export interface Comparison {
  field: string;
  operator: ComparisonOperator;
  value: Scalar;
}

export type FilterNode =
  | {
      kind: 'statement';
      comparisons: Comparison[];
      /** Every field the statement names, including ones whose comparisons were dropped. */
      fields?: string[];
    }
  | { kind: Connective; children: FilterNode[] };

export type StatementNode = Extract<FilterNode, { kind: 'statement' }>;
export type OperatorNode = Exclude<FilterNode, StatementNode>;

/** Root of a filter tree. `null` means no filtering at all. */
export type Selector = FilterNode | null;

/** Placeholder name (without the leading colon) to bound value. */
export type Params = Record<string, Scalar>;

export interface CompiledFilter {
  sql: string;
  params: Params;
  fields: ReadonlySet<string>;
}

export interface CompileOptions {
  /** Renders a field name into SQL text. Placeholders always derive from the raw name. */
  identifier?: (field: string) => string;
}
