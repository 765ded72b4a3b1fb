import { describe, it, expect } from 'vitest';
import { createNameRegistry, NameRegistry } from '../../../src/lib/naming/index.js';

function registry(style: 'pascal' | 'camel' = 'pascal'): NameRegistry {
  return createNameRegistry({ style, reservedWords: ['class', 'string'] });
}

describe('NameRegistry', () => {
  describe('allocate', () => {
    it('should give the canonical name to the most natural raw name', () => {
      expect(registry().allocate(['_id', 'Id'])).toEqual(['UnderscoreId', 'Id']);
      expect(registry().allocate(['id', 'Id'])).toEqual(['IdLowercase', 'Id']);
    });

    it('should differentiate every other member of a colliding group', () => {
      expect(registry().allocate(['Name', '_name', 'name'])).toEqual([
        'Name',
        'UnderscoreName',
        'NameLowercase',
      ]);
    });

    it('should keep the first raw name on a tie', () => {
      expect(registry().allocate(['user_name', 'user-name'])).toEqual(['UserName', 'UserDashName']);
    });

    it('should not hand another group its canonical name', () => {
      expect(registry().allocate(['my_string', 'MyString', 'MyUnderscoreString'])).toEqual([
        'MyStringSnakeCase',
        'MyString',
        'MyUnderscoreString',
      ]);
    });

    it('should be deterministic across registries', () => {
      const raws = ['status', 'Status', '_status', 'STATUS', 'order', 'Order'];
      expect(registry().allocate(raws)).toEqual(registry().allocate(raws));
    });

    it('should return unique names', () => {
      const names = registry().allocate(['a_b', 'a-b', 'a.b', 'aB', 'AB', 'ab']);
      expect(new Set(names).size).toBe(names.length);
    });

    it('should differentiate names already in use', () => {
      const names = registry();
      names.reserve('Status');
      expect(names.allocate(['Status'])).toEqual(['StatusPascalCase']);
    });

    it('should honour the camel style', () => {
      expect(registry('camel').allocate(['UserName', 'class'])).toEqual(['userName', '@class']);
    });

    it('should accept a custom canonical form', () => {
      const names = registry().allocate(['pet'], (raw) => `${raw.toUpperCase()}Value`);
      expect(names).toEqual(['PETValue']);
    });
  });

  describe('resolveCollision', () => {
    it('should report the keeper and the differentiated names', () => {
      const resolution = registry().resolveCollision(['status', 'Status']);
      expect(resolution).toEqual({
        canonicalName: 'Status',
        keeper: 'Status',
        keeperIndex: 1,
        others: [{ raw: 'status', index: 0, name: 'StatusLowercase' }],
      });
    });

    it('should differentiate every raw name when the canonical name is taken', () => {
      const names = registry();
      names.reserve('Status');
      const resolution = names.resolveCollision(['Status']);
      expect(resolution.keeper).toBeUndefined();
      expect(resolution.others).toEqual([{ raw: 'Status', index: 0, name: 'StatusPascalCase' }]);
    });
  });

  describe('claim', () => {
    it('should return the preferred name or its first free numeric variant', () => {
      const names = registry();
      names.reserve('Foo');
      expect(names.claim('Foo')).toBe('Foo2');
      expect(names.claim('Foo')).toBe('Foo3');
      expect(names.claim('Bar')).toBe('Bar');
    });
  });

  describe('entries', () => {
    it('should record the raw names behind every allocated identifier', () => {
      const names = registry();
      names.allocate(['Name', 'name']);
      expect(names.entries().get('Name')).toEqual(['Name']);
      expect(names.entries().get('NameLowercase')).toEqual(['name']);
      expect(names.isUsed('Name')).toBe(true);
      expect(names.isUsed('Other')).toBe(false);
    });
  });
});
