import { MalformedPredicateError } from '../errors.js';
import { anyOf, binary, constant, member, parameter } from './nodes.js';
import type {
  BinaryOp,
  CollectionAny,
  ComparisonOperator,
  ConstantValue,
  MemberAccess,
  ParameterRef,
  PredicateNode,
} from './types.js';

type Keys<T> = Extract<keyof NonNullable<T>, string>;
type ElementOf<T> = NonNullable<T> extends ReadonlyArray<infer E> ? E : never;

/** Values a field of type T may be compared with; untyped fields take any constant. */
export type Comparable<T> = unknown extends T
  ? ConstantValue
  : Extract<NonNullable<T>, ConstantValue> | null;

/**
 * Typed handle on a member chain of a record of type T. Every step returns a
 * new Field; the underlying nodes are immutable.
 */
export class Field<T> {
  constructor(readonly node: MemberAccess | ParameterRef) {}

  /** Navigate to a property of T. */
  get<K extends Keys<T>>(name: K): Field<NonNullable<T>[K]> {
    return new Field<NonNullable<T>[K]>(member(this.node, name));
  }

  /** The member chain, for $orderby and $expand. */
  get member(): MemberAccess {
    if (this.node.kind !== 'member') {
      throw new MalformedPredicateError(
        `Field "${this.node.name}" is the lambda parameter itself, not a member path`,
      );
    }
    return this.node;
  }

  eq(value: Comparable<T>): BinaryOp {
    return this._compare('Eq', value);
  }

  ne(value: Comparable<T>): BinaryOp {
    return this._compare('Ne', value);
  }

  gt(value: Comparable<T>): BinaryOp {
    return this._compare('Gt', value);
  }

  ge(value: Comparable<T>): BinaryOp {
    return this._compare('Ge', value);
  }

  lt(value: Comparable<T>): BinaryOp {
    return this._compare('Lt', value);
  }

  le(value: Comparable<T>): BinaryOp {
    return this._compare('Le', value);
  }

  /**
   * Some element of this collection satisfies `body`. The element is bound to
   * `variable` inside the generated any() lambda.
   */
  any(variable: string, body: (element: Field<ElementOf<T>>) => PredicateNode): CollectionAny {
    const element = new Field<ElementOf<T>>(parameter(variable));
    return anyOf(this.member, variable, body(element));
  }

  private _compare(operator: ComparisonOperator, value: ConstantValue): BinaryOp {
    return binary(operator, this.node, constant(value));
  }
}

/**
 * Starts a typed predicate over records of type T, bound to `name`.
 *
 * @example
 * const x = lambda<Customer>('x');
 * x.get('Orders').any('o', (o) => o.get('Total').gt(100));
 * // Orders/any(o: o/Total gt 100)
 */
export function lambda<T>(name: string): Field<T> {
  return new Field<T>(parameter(name));
}
