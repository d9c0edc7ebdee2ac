export { odata } from './query/query-object.js';
export { ODataQuery } from './query/builder.js';
export { buildQuery } from './query/assembler.js';
export { translateFilter } from './query/filter.js';
export { resolvePath, rootParameter } from './query/path.js';
export {
  parameter,
  member,
  constant,
  binary,
  anyOf,
  path,
  eq,
  ne,
  gt,
  ge,
  lt,
  le,
  and,
  or,
} from './predicate/nodes.js';
export type { Operand } from './predicate/nodes.js';
export { Field, lambda } from './predicate/field.js';
export type { Comparable } from './predicate/field.js';
export { parsePredicate } from './predicate/schema.js';
export { OPERATOR_TOKENS, isBinaryOperator } from './predicate/types.js';
export type {
  BinaryOperator,
  ComparisonOperator,
  LogicalOperator,
  ConstantValue,
  BinaryOp,
  MemberAccess,
  Constant,
  ParameterRef,
  CollectionAny,
  PredicateNode,
} from './predicate/types.js';
export type { QueryOptions, QueryBuilderConfig } from './types.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export {
  MalformedPredicateError,
  UnsupportedOperatorError,
  UnsupportedPathExpressionError,
  InvalidQueryOptionError,
} from './errors.js';
