import type { UnionDeclaration, UnionVariant } from '../../types/declarations.js';
import { isReference } from '../../types/schema.js';
import { compositionMembers } from '../resolver/formats.js';
import type { NamedDeclaration, SynthesisContext } from './types.js';

/**
 * Build a union from a `oneOf`/`anyOf` node.
 *
 * With a discriminator, variants follow the mapping order; members the mapping
 * leaves out use their raw schema name as the discriminator value. Variants that
 * name no declaration are dropped and reported.
 */
export function buildUnion(declaration: NamedDeclaration, ctx: SynthesisContext): UnionDeclaration {
  const { node, scope } = declaration;
  const members = compositionMembers(node)?.members ?? [];
  const discriminator = node.discriminator;
  const variants: UnionVariant[] = [];

  if (discriminator !== undefined) {
    const mapped = new Set<string>();
    for (const [value, target] of discriminator.mapping ?? []) {
      mapped.add(target);
      const variant = ctx.topLevel(target);
      if (variant === undefined) {
        ctx.diagnostics.report(
          'UnresolvedDiscriminatorTarget',
          `Discriminator value "${value}" of "${declaration.raw}" maps to "${target}", which declares nothing`,
          scope,
        );
        continue;
      }
      variants.push({ declaration: variant.name, discriminatorValue: value });
    }

    for (const member of members) {
      if (!isReference(member)) {
        ctx.diagnostics.report(
          'UnsupportedUnionMember',
          `Inline member of discriminated union "${declaration.raw}" dropped`,
          scope,
        );
        continue;
      }
      if (mapped.has(member.$ref)) {
        continue;
      }
      const variant = ctx.topLevel(member.$ref);
      if (variant === undefined) {
        ctx.diagnostics.report(
          'UnresolvedDiscriminatorTarget',
          `Member "${member.$ref}" of "${declaration.raw}" declares nothing`,
          scope,
        );
        continue;
      }
      variants.push({ declaration: variant.name, discriminatorValue: member.$ref });
    }
  } else {
    for (const member of members) {
      if (!isReference(member)) {
        ctx.diagnostics.report('UnsupportedUnionMember', `Inline member of union "${declaration.raw}" dropped`, scope);
        continue;
      }
      const variant = ctx.topLevel(member.$ref);
      if (variant === undefined) {
        const code = ctx.schemas.has(member.$ref) ? 'UnsupportedUnionMember' : 'UnresolvedReference';
        ctx.diagnostics.report(code, `Member "${member.$ref}" of union "${declaration.raw}" dropped`, scope);
        continue;
      }
      variants.push({ declaration: variant.name });
    }
  }

  return {
    kind: 'union',
    name: declaration.name,
    sourceName: declaration.raw,
    marker: discriminator !== undefined ? 'abstract' : 'open',
    discriminator: discriminator?.propertyName,
    variants,
    description: node.description,
  };
}
