import { binary } from '../predicate/nodes.js';
import type { MemberAccess, PredicateNode } from '../predicate/types.js';
import type { QueryBuilderConfig, QueryOptions } from '../types.js';
import { buildQuery } from './assembler.js';

/**
 * Combines a new predicate with the current filter. 'where' replaces it;
 * 'and' / 'or' wrap both in a BinaryOp, or act like 'where' when there is
 * no filter yet.
 */
function _applyFilter(
  current: PredicateNode | undefined,
  combinator: 'where' | 'and' | 'or',
  predicate: PredicateNode,
): PredicateNode {
  if (combinator === 'where' || current === undefined) {
    return predicate;
  }
  return binary(combinator === 'and' ? 'And' : 'Or', current, predicate);
}

/**
 * Fluent immutable query builder. Every operation returns a new ODataQuery;
 * existing instances are never mutated.
 */
export class ODataQuery {
  constructor(
    readonly options: Readonly<QueryOptions> = {},
    private readonly _config: QueryBuilderConfig = {},
  ) {}

  private _with(patch: QueryOptions): ODataQuery {
    return new ODataQuery({ ...this.options, ...patch }, this._config);
  }

  /** Replace the filter. */
  where(predicate: PredicateNode): ODataQuery {
    return this._with({ filter: _applyFilter(this.options.filter, 'where', predicate) });
  }

  /** Combine with the existing filter using AND. */
  and(predicate: PredicateNode): ODataQuery {
    return this._with({ filter: _applyFilter(this.options.filter, 'and', predicate) });
  }

  /** Combine with the existing filter using OR. */
  or(predicate: PredicateNode): ODataQuery {
    return this._with({ filter: _applyFilter(this.options.filter, 'or', predicate) });
  }

  orderBy(path: MemberAccess): ODataQuery {
    return this._with({ orderBy: path });
  }

  skip(count: number): ODataQuery {
    return this._with({ skip: count });
  }

  top(count: number): ODataQuery {
    return this._with({ top: count });
  }

  /** Append navigation paths to $expand. */
  expand(...paths: MemberAccess[]): ODataQuery {
    return this._with({ expand: [...(this.options.expand ?? []), ...paths] });
  }

  build(): string {
    return buildQuery(this.options, this._config);
  }

  toString(): string {
    return this.build();
  }
}
