import { z } from 'zod';
import { InvalidQueryOptionError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { QueryBuilderConfig, QueryOptions } from '../types.js';
import { translateFilter } from './filter.js';
import { resolvePath } from './path.js';

const PagingSchema = z.number().int().nonnegative().safe();

function validatePaging(option: 'skip' | 'top', value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const result = PagingSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidQueryOptionError(
      option,
      `${option} must be a non-negative integer, got ${value}`,
      result.error,
    );
  }
  return result.data;
}

function assemble(options: QueryOptions): string {
  const skip = validatePaging('skip', options.skip);
  const top = validatePaging('top', options.top);
  const clauses: string[] = [];

  if (options.filter !== undefined) {
    clauses.push(`$filter=${translateFilter(options.filter)}`);
  }
  if (options.orderBy !== undefined) {
    clauses.push(`$orderby=${resolvePath(options.orderBy)}`);
  }
  if (skip !== undefined) {
    clauses.push(`$skip=${skip}`);
  }
  if (top !== undefined) {
    clauses.push(`$top=${top}`);
  }
  if (options.expand !== undefined && options.expand.length > 0) {
    clauses.push(`$expand=${options.expand.map(resolvePath).join(',')}`);
  }

  return clauses.join('&');
}

/**
 * Builds an unencoded OData query string. Clauses are emitted in the fixed
 * order $filter, $orderby, $skip, $top, $expand and joined with `&`; absent
 * directives are left out, so no options yields ''.
 */
export function buildQuery(options: QueryOptions = {}, config: QueryBuilderConfig = {}): string {
  const logger = config.logger ?? defaultLogger;
  let query: string;
  try {
    query = assemble(options);
  } catch (err) {
    logger.debug({ err }, 'OData query translation failed');
    throw err;
  }
  logger.debug({ query }, 'Built OData query');
  return query;
}
