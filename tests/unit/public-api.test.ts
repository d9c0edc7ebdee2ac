import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the odata entry object', async () => {
    const { odata } = await import('../../src/index.js');
    expect(typeof odata.query).toBe('function');
    expect(typeof odata.where).toBe('function');
  });

  it('exports the translation operations', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.buildQuery).toBe('function');
    expect(typeof api.translateFilter).toBe('function');
    expect(typeof api.resolvePath).toBe('function');
    expect(typeof api.parsePredicate).toBe('function');
  });

  it('exports the node constructors', async () => {
    const api = await import('../../src/index.js');
    for (const name of ['parameter', 'member', 'constant', 'binary', 'anyOf', 'path', 'eq', 'and', 'or', 'lambda']) {
      expect(typeof (api as Record<string, unknown>)[name]).toBe('function');
    }
  });

  it('exports error classes usable with instanceof', async () => {
    const {
      MalformedPredicateError,
      UnsupportedOperatorError,
      UnsupportedPathExpressionError,
      InvalidQueryOptionError,
    } = await import('../../src/index.js');
    expect(new MalformedPredicateError('m')).toBeInstanceOf(Error);
    expect(new UnsupportedOperatorError('Modulo')).toBeInstanceOf(UnsupportedOperatorError);
    expect(new UnsupportedPathExpressionError('m').name).toBe('UnsupportedPathExpressionError');
    expect(new InvalidQueryOptionError('top', 'm').option).toBe('top');
  });

  it('does NOT export the default logger (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['defaultLogger']).toBeUndefined();
  });

  it('buildQuery through the public entry produces the documented scenario', async () => {
    const { buildQuery, anyOf, gt, path } = await import('../../src/index.js');
    const filter = anyOf(path('x', 'Orders'), 'o', gt(path('o', 'Total'), 100));
    expect(buildQuery({ filter })).toBe('$filter=Orders/any(o: o/Total gt 100)');
  });
});
