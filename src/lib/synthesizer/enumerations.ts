import type { EnumerationDeclaration, EnumerationMember } from '../../types/declarations.js';
import type { GeneratorOptions } from '../../types/config.js';
import { createNameRegistry } from '../naming/index.js';
import { enumLiterals, enumerationKind } from '../resolver/formats.js';
import type { NamedDeclaration } from './types.js';

export function buildEnumeration(declaration: NamedDeclaration, options: GeneratorOptions): EnumerationDeclaration {
  const { node } = declaration;
  const literals = [...new Set(enumLiterals(node))];

  // member names are scoped to the enumeration; "" becomes `Empty`
  const registry = createNameRegistry({
    style: options.namingStyle,
    reservedWords: options.reservedWords,
    fallback: 'Empty',
  });
  const names = registry.allocate(literals.map(String));
  const members = literals.map((value, index): EnumerationMember => ({ name: names[index], value }));

  return {
    kind: 'enumeration',
    name: declaration.name,
    sourceName: declaration.raw,
    underlying: enumerationKind(node) ?? 'string',
    members,
    description: node.description,
  };
}
