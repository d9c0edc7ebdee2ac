import { UnsupportedPathExpressionError } from '../errors.js';
import type { MemberAccess, ParameterRef } from '../predicate/types.js';

interface ResolvedPath {
  segments: string[];
  root: ParameterRef;
}

function walk(node: MemberAccess): ResolvedPath {
  const segments: string[] = [node.name];
  let current = node.base;

  while (current.kind === 'member') {
    segments.unshift(current.name);
    current = current.base;
  }

  if (current.kind !== 'parameter') {
    throw new UnsupportedPathExpressionError(
      `Unsupported ${current.kind} node in member path "${segments.join('/')}"`,
    );
  }
  return { segments, root: current };
}

/**
 * Flattens a member chain into a slash-delimited navigation path. The root
 * parameter contributes no segment: `x.Address.City` resolves to `Address/City`.
 */
export function resolvePath(node: MemberAccess): string {
  return walk(node).segments.join('/');
}

/** Returns the ParameterRef a member chain is rooted at. */
export function rootParameter(node: MemberAccess): ParameterRef {
  return walk(node).root;
}
