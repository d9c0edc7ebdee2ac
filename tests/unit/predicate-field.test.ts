import { describe, it, expect } from 'vitest';
import { Field, lambda } from '../../src/predicate/field.js';
import { parameter, path } from '../../src/predicate/nodes.js';
import { translateFilter } from '../../src/query/filter.js';
import { MalformedPredicateError } from '../../src/errors.js';

interface Address {
  City: string;
  Country: string;
}

interface OrderLine {
  Sku: string;
  Quantity: number;
}

interface Order {
  Total: number;
  Status: 'Open' | 'Paid';
  Lines: OrderLine[];
}

interface Customer {
  Name: string;
  Age: number;
  Vip: boolean;
  Email: string | null;
  Address?: Address;
  Orders: Order[];
  Tags: readonly string[];
}

describe('Field', () => {
  const x = lambda<Customer>('x');

  describe('navigation', () => {
    it('lambda() wraps a ParameterRef', () => {
      expect(x.node).toEqual(parameter('x'));
    });

    it('get() builds member chains', () => {
      expect(x.get('Address').get('City').node).toEqual(path('x', 'Address', 'City'));
    });

    it('member returns the MemberAccess', () => {
      expect(x.get('Name').member).toEqual(path('x', 'Name'));
    });

    it('member on the bare parameter throws MalformedPredicateError', () => {
      expect(() => x.member).toThrow(MalformedPredicateError);
    });

    it('each step returns a new Field', () => {
      const address = x.get('Address');
      expect(address).toBeInstanceOf(Field);
      expect(address).not.toBe(x.get('Address'));
    });
  });

  describe('comparisons', () => {
    it('each comparison method builds the matching operator', () => {
      const age = x.get('Age');
      expect(age.eq(18).operator).toBe('Eq');
      expect(age.ne(18).operator).toBe('Ne');
      expect(age.gt(18).operator).toBe('Gt');
      expect(age.ge(18).operator).toBe('Ge');
      expect(age.lt(18).operator).toBe('Lt');
      expect(age.le(18).operator).toBe('Le');
    });

    it('compares against a constant', () => {
      expect(x.get('Vip').eq(true).right).toEqual({ kind: 'constant', value: true });
    });

    it('nullable fields compare with null', () => {
      expect(translateFilter(x.get('Email').ne(null))).toBe('Email ne null');
    });

    it('translates nested navigation', () => {
      expect(translateFilter(x.get('Address').get('Country').eq('NL'))).toBe("Address/Country eq 'NL'");
    });
  });

  describe('any()', () => {
    it('binds the element and translates to an any() lambda', () => {
      const predicate = x.get('Orders').any('o', (o) => o.get('Total').gt(100));
      expect(translateFilter(predicate)).toBe('Orders/any(o: o/Total gt 100)');
    });

    it('nests over element collections', () => {
      const predicate = x.get('Orders').any('o', (o) =>
        o.get('Lines').any('l', (l) => l.get('Quantity').ge(10)),
      );
      expect(translateFilter(predicate)).toBe('Orders/any(o: o/Lines/any(l: l/Quantity ge 10))');
    });

    it('primitive collections compare the element itself', () => {
      const predicate = x.get('Tags').any('t', (t) => t.eq('red'));
      expect(translateFilter(predicate)).toBe("Tags/any(t: t eq 'red')");
    });

    it('literal union element fields accept their members', () => {
      const predicate = x.get('Orders').any('o', (o) => o.get('Status').eq('Paid'));
      expect(translateFilter(predicate)).toBe("Orders/any(o: o/Status eq 'Paid')");
    });

    it('any() on the bare parameter throws MalformedPredicateError', () => {
      const tags = lambda<string[]>('tags');
      expect(() => tags.any('t', (t) => t.eq('red'))).toThrow(MalformedPredicateError);
    });
  });
});
