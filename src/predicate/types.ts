export type ComparisonOperator = 'Eq' | 'Ne' | 'Gt' | 'Ge' | 'Lt' | 'Le';
export type LogicalOperator = 'And' | 'Or';
export type BinaryOperator = ComparisonOperator | LogicalOperator;

export type ConstantValue = string | number | boolean | null;

export interface BinaryOp {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: PredicateNode;
  readonly right: PredicateNode;
}

/** `base.name`; chaining forms a navigation path. */
export interface MemberAccess {
  readonly kind: 'member';
  readonly name: string;
  readonly base: PredicateNode;
}

export interface Constant {
  readonly kind: 'constant';
  readonly value: ConstantValue;
}

/** Root of a member chain, bound to the predicate's input variable. */
export interface ParameterRef {
  readonly kind: 'parameter';
  readonly name: string;
}

/**
 * "Some element of the collection satisfies predicate". The predicate may refer
 * to the element through boundParameterName.
 */
export interface CollectionAny {
  readonly kind: 'any';
  readonly collectionPath: MemberAccess;
  readonly boundParameterName: string;
  readonly predicate: PredicateNode;
}

export type PredicateNode = BinaryOp | MemberAccess | Constant | ParameterRef | CollectionAny;

export const OPERATOR_TOKENS: Readonly<Record<BinaryOperator, string>> = {
  Eq: 'eq',
  Ne: 'ne',
  Gt: 'gt',
  Ge: 'ge',
  Lt: 'lt',
  Le: 'le',
  And: 'and',
  Or: 'or',
};

export function isBinaryOperator(value: string): value is BinaryOperator {
  return Object.prototype.hasOwnProperty.call(OPERATOR_TOKENS, value);
}
