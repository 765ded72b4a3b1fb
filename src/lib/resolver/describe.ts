import type { PrimitiveKind, ResolvedType } from '../../types/declarations.js';

const CSHARP_PRIMITIVES: Readonly<Record<PrimitiveKind, string>> = {
  string: 'string',
  int32: 'int',
  int64: 'long',
  float: 'float',
  double: 'double',
  decimal: 'decimal',
  boolean: 'bool',
  dateTime: 'DateTimeOffset',
  date: 'DateOnly',
  time: 'TimeOnly',
  duration: 'TimeSpan',
  uuid: 'Guid',
  uri: 'Uri',
  bytes: 'byte[]',
  stream: 'Stream',
  object: 'object',
};

/**
 * C# spelling of a resolved type, used by the `names`/report output and in log lines
 */
export function formatResolvedType(type: ResolvedType): string {
  switch (type.kind) {
    case 'primitive':
      return CSHARP_PRIMITIVES[type.primitive];
    case 'reference':
      return type.name;
    case 'nullable':
      return `${formatResolvedType(type.inner)}?`;
    case 'collection': {
      const element = formatResolvedType(type.element);
      return type.mutability === 'readonly' ? `IReadOnlyList<${element}>` : `List<${element}>`;
    }
    case 'map': {
      const value = formatResolvedType(type.value);
      return type.mutability === 'readonly'
        ? `IReadOnlyDictionary<string, ${value}>`
        : `Dictionary<string, ${value}>`;
    }
  }
}
