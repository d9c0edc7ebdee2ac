import { MalformedPredicateError, UnsupportedOperatorError } from '../errors.js';
import { OPERATOR_TOKENS, isBinaryOperator } from '../predicate/types.js';
import type { BinaryOp, ConstantValue, MemberAccess, PredicateNode } from '../predicate/types.js';
import { resolvePath, rootParameter } from './path.js';

/** Refers to the entity being filtered from inside a lambda body. */
const IT = '$it';

/**
 * Per-call state shared by every recursive step. `outer` is the one free
 * parameter of the filter, fixed by the first chain rooted outside any lambda.
 */
interface TranslationState {
  outer: string | undefined;
}

function kindOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}

function claimOuter(name: string, state: TranslationState): void {
  if (state.outer === undefined) {
    state.outer = name;
    return;
  }
  if (state.outer !== name) {
    throw new MalformedPredicateError(
      `Parameter "${name}" is not in scope; the filter is bound to "${state.outer}"`,
    );
  }
}

/**
 * Prefix for a path rooted at `name`: the lambda variable when `name` is bound
 * by an enclosing any(), nothing at the top level, `$it/` for the outer
 * parameter inside a lambda body.
 */
function prefixFor(name: string, bound: readonly string[], state: TranslationState): string {
  if (bound.includes(name)) {
    return `${name}/`;
  }
  claimOuter(name, state);
  return bound.length > 0 ? `${IT}/` : '';
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'INF';
  if (value === -Infinity) return '-INF';
  return String(value);
}

function formatConstant(value: ConstantValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `'${value.replaceAll("'", "''")}'`;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return formatNumber(value);
}

function translateMember(
  node: MemberAccess,
  bound: readonly string[],
  state: TranslationState,
): string {
  const path = resolvePath(node);
  return prefixFor(rootParameter(node).name, bound, state) + path;
}

function translateBinary(
  node: BinaryOp,
  bound: readonly string[],
  state: TranslationState,
  outermost: boolean,
): string {
  if (!isBinaryOperator(node.operator)) {
    throw new UnsupportedOperatorError(String(node.operator));
  }
  const left = translateNode(node.left, bound, state, false);
  const right = translateNode(node.right, bound, state, false);
  const text = `${left} ${OPERATOR_TOKENS[node.operator]} ${right}`;

  // Outermost expressions are never wrapped, so right-nested chains keep the
  // `a and (b and c)` shape.
  const wrap = !outermost && (node.left.kind === 'binary' || node.right.kind === 'binary');
  return wrap ? `(${text})` : text;
}

function translateNode(
  node: PredicateNode,
  bound: readonly string[],
  state: TranslationState,
  outermost: boolean,
): string {
  switch (node.kind) {
    case 'binary':
      return translateBinary(node, bound, state, outermost);

    case 'member':
      return translateMember(node, bound, state);

    case 'constant':
      return formatConstant(node.value);

    case 'parameter':
      if (bound.includes(node.name)) {
        return node.name;
      }
      claimOuter(node.name, state);
      return IT;

    case 'any': {
      const collection = translateMember(node.collectionPath, bound, state);
      const inner = [...bound, node.boundParameterName];
      const body = translateNode(node.predicate, inner, state, true);
      return `${collection}/any(${node.boundParameterName}: ${body})`;
    }

    default: {
      const unknownNode: never = node;
      throw new MalformedPredicateError(`Unsupported predicate node kind: ${kindOf(unknownNode)}`);
    }
  }
}

/**
 * Translates a predicate tree into OData `$filter` text (without the
 * `$filter=` prefix).
 *
 * @example
 * translateFilter(and(gt(path('x', 'Age'), 18), eq(path('x', 'Status'), 'Active')))
 * // "Age gt 18 and Status eq 'Active'"
 */
export function translateFilter(root: PredicateNode): string {
  const state: TranslationState = { outer: undefined };
  return translateNode(root, [], state, true);
}
