import type { Logger } from './logger.js';
import type { MemberAccess, PredicateNode } from './predicate/types.js';

/** Every directive a query string can carry. Absent fields produce no clause. */
export interface QueryOptions {
  filter?: PredicateNode;
  orderBy?: MemberAccess;
  skip?: number;
  top?: number;
  expand?: readonly MemberAccess[];
}

export interface QueryBuilderConfig {
  /** Receives debug output for built and failed queries. Silent by default. */
  logger?: Logger;
}
