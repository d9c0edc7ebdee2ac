import { z } from 'zod';
import { MalformedPredicateError } from '../errors.js';
import { anyOf, binary, constant, member, parameter } from './nodes.js';
import type { ConstantValue, PredicateNode } from './types.js';

// Operators stay plain strings here; binary() decides which ones are supported.
type RawNode =
  | { kind: 'binary'; operator: string; left: RawNode; right: RawNode }
  | { kind: 'member'; name: string; base: RawNode }
  | { kind: 'constant'; value: ConstantValue }
  | { kind: 'parameter'; name: string }
  | { kind: 'any'; collectionPath: RawNode; boundParameterName: string; predicate: RawNode };

const NameSchema = z.string().min(1).max(256);

const RawNodeSchema: z.ZodType<RawNode> = z.lazy(() => z.union([
  z.object({
    kind: z.literal('binary'),
    operator: z.string(),
    left: RawNodeSchema,
    right: RawNodeSchema,
  }),
  z.object({ kind: z.literal('member'), name: NameSchema, base: RawNodeSchema }),
  z.object({
    kind: z.literal('constant'),
    value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  }),
  z.object({ kind: z.literal('parameter'), name: NameSchema }),
  z.object({
    kind: z.literal('any'),
    collectionPath: RawNodeSchema,
    boundParameterName: NameSchema,
    predicate: RawNodeSchema,
  }),
]));

function rebuild(raw: RawNode): PredicateNode {
  switch (raw.kind) {
    case 'binary':
      return binary(raw.operator, rebuild(raw.left), rebuild(raw.right));
    case 'member':
      return member(rebuild(raw.base), raw.name);
    case 'constant':
      return constant(raw.value);
    case 'parameter':
      return parameter(raw.name);
    case 'any': {
      const collectionPath = rebuild(raw.collectionPath);
      if (collectionPath.kind !== 'member') {
        throw new MalformedPredicateError(
          `anyOf: collectionPath must be a member chain rooted at a parameter, got ${collectionPath.kind}`,
        );
      }
      return anyOf(collectionPath, raw.boundParameterName, rebuild(raw.predicate));
    }
  }
}

/**
 * Validates an untyped predicate tree (for example one decoded from JSON) and
 * rebuilds it through the node constructors, so the same construction rules
 * apply as for trees built in code.
 */
export function parsePredicate(input: unknown): PredicateNode {
  const result = RawNodeSchema.safeParse(input);
  if (!result.success) {
    throw new MalformedPredicateError('parsePredicate: input is not a predicate tree', result.error);
  }
  return rebuild(result.data);
}
