import { MalformedPredicateError, UnsupportedOperatorError } from '../errors.js';
import { isBinaryOperator } from './types.js';
import type {
  BinaryOp,
  CollectionAny,
  ComparisonOperator,
  Constant,
  ConstantValue,
  LogicalOperator,
  MemberAccess,
  ParameterRef,
  PredicateNode,
} from './types.js';

/** A node, or a raw value to be wrapped in a Constant. */
export type Operand = PredicateNode | ConstantValue;

function chainRoot(node: PredicateNode): ParameterRef | undefined {
  let current = node;
  while (current.kind === 'member') {
    current = current.base;
  }
  return current.kind === 'parameter' ? current : undefined;
}

function toNode(operand: Operand): PredicateNode {
  return operand !== null && typeof operand === 'object' ? operand : constant(operand);
}

export function parameter(name: string): ParameterRef {
  if (name.trim() === '') {
    throw new MalformedPredicateError('parameter: name must be a non-empty string');
  }
  const node: ParameterRef = { kind: 'parameter', name };
  return Object.freeze(node);
}

/**
 * Builds `base.name`. Throws MalformedPredicateError unless `base` is a member
 * chain ending in a ParameterRef (or the ParameterRef itself).
 */
export function member(base: PredicateNode, name: string): MemberAccess {
  if (name.trim() === '') {
    throw new MalformedPredicateError('member: name must be a non-empty string');
  }
  if (chainRoot(base) === undefined) {
    throw new MalformedPredicateError(
      `member: "${name}" must be accessed on a member chain rooted at a parameter, got ${base.kind}`,
    );
  }
  const node: MemberAccess = { kind: 'member', name, base };
  return Object.freeze(node);
}

export function constant(value: ConstantValue): Constant {
  const node: Constant = { kind: 'constant', value };
  return Object.freeze(node);
}

/**
 * Builds a BinaryOp. The operator is checked at runtime so names coming from
 * untyped sources are rejected here rather than during translation.
 */
export function binary(operator: string, left: PredicateNode, right: PredicateNode): BinaryOp {
  if (!isBinaryOperator(operator)) {
    throw new UnsupportedOperatorError(operator);
  }
  const node: BinaryOp = { kind: 'binary', operator, left, right };
  return Object.freeze(node);
}

export function anyOf(
  collectionPath: MemberAccess,
  boundParameterName: string,
  predicate: PredicateNode,
): CollectionAny {
  if (collectionPath.kind !== 'member' || chainRoot(collectionPath) === undefined) {
    throw new MalformedPredicateError(
      'anyOf: collectionPath must be a member chain rooted at a parameter',
    );
  }
  if (boundParameterName.trim() === '') {
    throw new MalformedPredicateError('anyOf: boundParameterName must be a non-empty string');
  }
  const node: CollectionAny = { kind: 'any', collectionPath, boundParameterName, predicate };
  return Object.freeze(node);
}

/**
 * Builds a member chain from a parameter name.
 *
 * @example
 * path('x', 'Address', 'City') // x.Address.City
 */
export function path(root: string, first: string, ...rest: string[]): MemberAccess {
  return rest.reduce(member, member(parameter(root), first));
}

function comparison(operator: ComparisonOperator) {
  return (left: Operand, right: Operand): BinaryOp => binary(operator, toNode(left), toNode(right));
}

function logical(operator: LogicalOperator) {
  return (left: PredicateNode, right: PredicateNode): BinaryOp => binary(operator, left, right);
}

export const eq = comparison('Eq');
export const ne = comparison('Ne');
export const gt = comparison('Gt');
export const ge = comparison('Ge');
export const lt = comparison('Lt');
export const le = comparison('Le');
export const and = logical('And');
export const or = logical('Or');
