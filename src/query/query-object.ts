import type { PredicateNode } from '../predicate/types.js';
import type { QueryBuilderConfig } from '../types.js';
import { ODataQuery } from './builder.js';

/**
 * Entry point for the fluent query builder.
 *
 * @example
 * const x = lambda<Customer>('x');
 * odata
 *   .where(x.get('Age').gt(18))
 *   .orderBy(x.get('Address').get('City').member)
 *   .top(5)
 *   .build();
 * // "$filter=Age gt 18&$orderby=Address/City&$top=5"
 */
export const odata = {
  query(config?: QueryBuilderConfig): ODataQuery {
    return new ODataQuery({}, config);
  },
  /** Shorthand for `odata.query().where(predicate)` with the default config. */
  where(predicate: PredicateNode): ODataQuery {
    return odata.query().where(predicate);
  },
};
