import { describe, it, expect } from 'vitest';
import {
  PLACEHOLDER_DEFAULT,
  quoteString,
  renderDefault,
  renderMemberDefault,
  type LiteralContext,
} from '../../src/lib/literals/index.js';
import { nullable, OPAQUE, primitive } from '../../src/lib/resolver/index.js';
import type { EnumerationDeclaration, ResolvedType } from '../../src/types/declarations.js';

const mode: EnumerationDeclaration = {
  kind: 'enumeration',
  name: 'Mode',
  sourceName: 'mode',
  underlying: 'string',
  members: [
    { name: 'Auto', value: 'auto' },
    { name: 'Manual', value: 'manual' },
  ],
};

function context(namespace = 'TestModels'): LiteralContext {
  return {
    namespace,
    enumeration: (name) => (name === mode.name ? mode : undefined),
  };
}

const ctx = context();
const modeRef: ResolvedType = { kind: 'reference', name: 'Mode' };

describe('quoteString', () => {
  it('should escape quotes and backslashes', () => {
    expect(quoteString('say "hello"')).toBe('"say \\"hello\\""');
    expect(quoteString('C:\\temp')).toBe('"C:\\\\temp"');
  });

  it('should use simple escapes for common control characters', () => {
    expect(quoteString('a\nb\tc\r')).toBe('"a\\nb\\tc\\r"');
    expect(quoteString('\0\u0007\b\f\v')).toBe('"\\0\\a\\b\\f\\v"');
  });

  it('should use unicode escapes for other control and separator characters', () => {
    expect(quoteString('\u0001')).toBe('"\\u0001"');
    expect(quoteString('\u009f')).toBe('"\\u009F"');
    expect(quoteString('line\u2028break')).toBe('"line\\u2028break"');
  });

  it('should keep printable non-ASCII text as is', () => {
    expect(quoteString('café ☕')).toBe('"café ☕"');
  });
});

describe('renderDefault', () => {
  it('should render booleans and numbers with type suffixes', () => {
    expect(renderDefault(true, primitive('boolean'), ctx)).toEqual({ kind: 'literal', code: 'true' });
    expect(renderDefault(5, primitive('int32'), ctx)).toEqual({ kind: 'literal', code: '5' });
    expect(renderDefault(1024, primitive('int64'), ctx)).toEqual({ kind: 'literal', code: '1024L' });
    expect(renderDefault(0.5, primitive('double'), ctx)).toEqual({ kind: 'literal', code: '0.5d' });
    expect(renderDefault(1, primitive('float'), ctx)).toEqual({ kind: 'literal', code: '1f' });
    expect(renderDefault(19.99, primitive('decimal'), ctx)).toEqual({ kind: 'literal', code: '19.99m' });
  });

  it('should keep the sign of negative zero for fractional kinds', () => {
    expect(renderDefault(-0, primitive('double'), ctx)).toEqual({ kind: 'literal', code: '-0d' });
    expect(renderDefault(-0, primitive('float'), ctx)).toEqual({ kind: 'literal', code: '-0f' });
    expect(renderDefault(-0, primitive('decimal'), ctx)).toEqual({ kind: 'literal', code: '-0m' });
    expect(renderDefault(-0, primitive('int32'), ctx)).toEqual({ kind: 'literal', code: '0' });
  });

  it('should skip numbers the member type cannot hold', () => {
    expect(renderDefault(5.5, primitive('int32'), ctx)).toBeUndefined();
    expect(renderDefault(3_000_000_000, primitive('int32'), ctx)).toBeUndefined();
    expect(renderDefault(2 ** 60, primitive('int64'), ctx)).toBeUndefined();
    expect(renderDefault(1e39, primitive('float'), ctx)).toBeUndefined();
    expect(renderDefault(1e29, primitive('decimal'), ctx)).toBeUndefined();
  });

  it('should skip values of the wrong JSON kind', () => {
    expect(renderDefault('5', primitive('int32'), ctx)).toBeUndefined();
    expect(renderDefault(1, primitive('boolean'), ctx)).toBeUndefined();
    expect(renderDefault({ a: 1 }, OPAQUE, ctx)).toBeUndefined();
  });

  it('should render strings as escaped literals', () => {
    expect(renderDefault('say "hi"', primitive('string'), ctx)).toEqual({
      kind: 'literal',
      code: '"say \\"hi\\""',
    });
  });

  it('should render formatted strings as parse expressions', () => {
    expect(renderDefault('2025-06-15T10:30:00Z', primitive('dateTime'), ctx)).toEqual({
      kind: 'construct',
      code: 'DateTimeOffset.Parse("2025-06-15T10:30:00Z", CultureInfo.InvariantCulture, DateTimeStyles.AdjustToUniversal)',
    });
    expect(renderDefault('2025-06-15', primitive('date'), ctx)).toEqual({
      kind: 'construct',
      code: 'DateOnly.Parse("2025-06-15", CultureInfo.InvariantCulture)',
    });
    expect(renderDefault('12:30:00', primitive('time'), ctx)).toEqual({
      kind: 'construct',
      code: 'TimeOnly.Parse("12:30:00", CultureInfo.InvariantCulture)',
    });
    expect(renderDefault('3fa85f64-5717-4562-b3fc-2c963f66afa6', primitive('uuid'), ctx)).toEqual({
      kind: 'construct',
      code: 'Guid.Parse("3fa85f64-5717-4562-b3fc-2c963f66afa6")',
    });
    expect(renderDefault('https://example.com', primitive('uri'), ctx)).toEqual({
      kind: 'construct',
      code: 'new Uri("https://example.com/")',
    });
  });

  it('should render ISO and clock durations', () => {
    expect(renderDefault('PT1H30M', primitive('duration'), ctx)).toEqual({
      kind: 'construct',
      code: 'XmlConvert.ToTimeSpan("PT1H30M")',
    });
    expect(renderDefault('01:30:00', primitive('duration'), ctx)).toEqual({
      kind: 'construct',
      code: 'TimeSpan.Parse("01:30:00", CultureInfo.InvariantCulture)',
    });
  });

  it('should skip formatted strings that do not parse', () => {
    expect(renderDefault('yesterday', primitive('dateTime'), ctx)).toBeUndefined();
    expect(renderDefault('2', primitive('dateTime'), ctx)).toBeUndefined();
    expect(renderDefault('2025-13-40T10:30:00Z', primitive('dateTime'), ctx)).toBeUndefined();
    expect(renderDefault('June 15', primitive('date'), ctx)).toBeUndefined();
    expect(renderDefault('noon', primitive('time'), ctx)).toBeUndefined();
    expect(renderDefault('P', primitive('duration'), ctx)).toBeUndefined();
    expect(renderDefault('not-a-uuid', primitive('uuid'), ctx)).toBeUndefined();
    expect(renderDefault('not a uri', primitive('uri'), ctx)).toBeUndefined();
    expect(renderDefault('AAEC', primitive('bytes'), ctx)).toBeUndefined();
  });

  it('should qualify enumeration members with the namespace', () => {
    expect(renderDefault('auto', modeRef, ctx)).toEqual({ kind: 'enumMember', code: 'TestModels.Mode.Auto' });
    expect(renderDefault('manual', modeRef, context(''))).toEqual({ kind: 'enumMember', code: 'Mode.Manual' });
    expect(renderDefault('other', modeRef, ctx)).toBeUndefined();
    expect(renderDefault('auto', { kind: 'reference', name: 'Pet' }, ctx)).toBeUndefined();
  });

  it('should render only empty arrays for collections', () => {
    const tags: ResolvedType = { kind: 'collection', element: primitive('string'), mutability: 'readonly' };
    expect(renderDefault([], tags, ctx)).toEqual({ kind: 'emptyCollection', code: '[]' });
    expect(renderDefault(['a'], tags, ctx)).toBeUndefined();
    expect(renderDefault({}, { kind: 'map', value: primitive('string'), mutability: 'readonly' }, ctx)).toBeUndefined();
  });

  it('should look through nullable types', () => {
    expect(renderDefault(5, nullable(primitive('int32')), ctx)).toEqual({ kind: 'literal', code: '5' });
  });

  it('should render nothing for absent or null defaults', () => {
    expect(renderDefault(undefined, primitive('string'), ctx)).toBeUndefined();
    expect(renderDefault(null, nullable(primitive('string')), ctx)).toBeUndefined();
  });
});

describe('renderMemberDefault', () => {
  it('should pass rendered defaults through when propagating', () => {
    expect(renderMemberDefault(5, primitive('int32'), ctx, true)).toEqual({ kind: 'literal', code: '5' });
  });

  it('should replace rendered defaults with a placeholder when not propagating', () => {
    expect(renderMemberDefault(5, primitive('int32'), ctx, false)).toEqual(PLACEHOLDER_DEFAULT);
    expect(PLACEHOLDER_DEFAULT).toEqual({ kind: 'placeholder', code: 'null!' });
  });

  it('should not add a placeholder where no default would be rendered', () => {
    expect(renderMemberDefault({ a: 1 }, OPAQUE, ctx, false)).toBeUndefined();
    expect(renderMemberDefault(undefined, primitive('string'), ctx, false)).toBeUndefined();
  });
});
