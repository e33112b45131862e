export { decodeSelector } from './selector/decoder.js';
export type { DecodeOptions } from './selector/decoder.js';
export { compileSelector, compileStatement, FilterCompiler } from './selector/compiler.js';
export { toPositional } from './selector/positional.js';
export type { PositionalQuery } from './selector/positional.js';
export { SchemaGuard } from './selector/schema-guard.js';
export type { SchemaIntrospector } from './selector/schema-guard.js';
export type {
  ComparisonOperator,
  Connective,
  Comparison,
  FilterNode,
  StatementNode,
  OperatorNode,
  Selector,
  Scalar,
  Params,
  CompiledFilter,
  CompileOptions,
} from './selector/types.js';
export type {
  Row,
  AggregateFunction,
  SelectRequest,
  SelectOptions,
  TableStore,
} from './types.js';
export { PostgresTableStore } from './store/table-store.js';
export type { TableStoreConfig } from './store/table-store.js';
export { buildServer } from './api/server.js';
export type { ServerOptions } from './api/server.js';
export { loadConfig } from './config.js';
export type { ServiceConfig } from './config.js';
export {
  SelectorValidationError,
  UnknownTableError,
  UnknownFieldError,
  TableStoreError,
  AuthenticationError,
} from './errors.js';
