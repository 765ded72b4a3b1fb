/**
 * Declaration Synthesizer - builds the declaration set for one schema map
 *
 * Pass 1 discovers and names every declaration (top-level and inline) through a
 * single registry; pass 2 assembles them. All state lives on the instance, so
 * independent runs share nothing.
 */

import { resolveOptions, type GeneratorOptions } from '../../types/config.js';
import type {
  Declaration,
  DeclarationKind,
  EnumerationDeclaration,
  GenerationResult,
} from '../../types/declarations.js';
import type { SchemaMap, SchemaNode } from '../../types/schema.js';
import { ErrorCode, SchemawrightError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DiagnosticCollector } from '../diagnostics/index.js';
import type { LiteralContext } from '../literals/index.js';
import { createNameRegistry } from '../naming/index.js';
import { TypeResolver, unwrapNullable, type DeclarationLookup } from '../resolver/index.js';
import { AggregateAssembler } from './aggregates.js';
import { discoverDeclarations } from './discovery.js';
import { buildEnumeration } from './enumerations.js';
import type { NamedDeclaration, SynthesisContext } from './types.js';
import { buildUnion } from './unions.js';

export * from './types.js';
export { classifySchema, isEmptyObject } from './classifier.js';
export { discoverDeclarations, type DiscoveryResult } from './discovery.js';

export class DeclarationSynthesizer {
  private readonly options: GeneratorOptions;

  constructor(
    private readonly schemas: SchemaMap,
    options: Partial<GeneratorOptions> = {},
  ) {
    this.options = resolveOptions(options);
  }

  synthesize(): GenerationResult {
    logger.info('Synthesizing declarations', { schemas: this.schemas.size });
    const diagnostics = new DiagnosticCollector();

    const named = this.discoverAndName();
    const topLevel = new Map<string, NamedDeclaration>();
    const inline = new Map<SchemaNode, string>();
    for (const declaration of named.declarations) {
      if (declaration.topLevel) {
        topLevel.set(declaration.raw, declaration);
      }
    }
    for (const [node, position] of named.inline) {
      const declaration = named.declarations[position];
      if (declaration !== undefined) {
        inline.set(node, declaration.name);
      }
    }

    const lookup: DeclarationLookup = {
      // open unions are not referenced by name; their members fall back to an opaque type
      declarationName: (raw) => {
        const declaration = topLevel.get(raw);
        if (declaration?.kind === 'union' && declaration.node.discriminator === undefined) {
          return undefined;
        }
        return declaration?.name;
      },
      inlineName: (node) => inline.get(node),
    };

    const enumerations = new Map<string, EnumerationDeclaration>();
    const literals: LiteralContext = {
      namespace: this.options.namespace,
      enumeration: (name) => enumerations.get(name),
    };

    const resolver = new TypeResolver(this.schemas, lookup, this.options, diagnostics);
    const ctx: SynthesisContext = {
      schemas: this.schemas,
      options: this.options,
      diagnostics,
      resolver,
      literals,
      topLevel: (raw) => topLevel.get(raw),
    };

    // enumerations first: aggregate defaults refer to their members
    for (const declaration of named.declarations) {
      if (declaration.kind === 'enumeration') {
        enumerations.set(declaration.name, buildEnumeration(declaration, this.options));
      }
    }

    const aggregates = new AggregateAssembler(ctx);
    const declarations = named.declarations.map((declaration): Declaration => {
      switch (declaration.kind) {
        case 'enumeration': {
          const enumeration = enumerations.get(declaration.name);
          return enumeration ?? buildEnumeration(declaration, this.options);
        }
        case 'aggregate':
          return aggregates.build(declaration);
        case 'union':
          return buildUnion(declaration, ctx);
        case 'typeAlias':
          return {
            kind: 'typeAlias',
            name: declaration.name,
            sourceName: declaration.raw,
            type: unwrapNullable(resolver.withScope(declaration.scope, () => resolver.resolve(declaration.node))),
            description: declaration.node.description,
          };
      }
    });

    const index = new Map<string, DeclarationKind>();
    for (const declaration of declarations) {
      index.set(declaration.name, declaration.kind);
    }

    logger.info('Declarations synthesized', {
      declarations: declarations.length,
      diagnostics: diagnostics.count(),
    });

    return { declarations, index, diagnostics: diagnostics.list() };
  }

  private discoverAndName(): { declarations: NamedDeclaration[]; inline: ReadonlyMap<SchemaNode, number> } {
    const discovery = discoverDeclarations(this.schemas);
    const registry = createNameRegistry({
      style: this.options.namingStyle,
      reservedWords: this.options.reservedWords,
    });
    const names = registry.allocate(discovery.declarations.map((declaration) => declaration.raw));

    const declarations = discovery.declarations.map((declaration, index): NamedDeclaration => {
      const name = names[index];
      if (name === undefined) {
        throw new SchemawrightError(ErrorCode.SYNTHESIS_ERROR, `No name allocated for "${declaration.raw}"`);
      }
      logger.debug('Declaration named', { raw: declaration.raw, name, kind: declaration.kind });
      return { ...declaration, name };
    });

    return { declarations, inline: discovery.inline };
  }
}

/**
 * Synthesize the declaration set for `schemas`
 */
export function synthesize(schemas: SchemaMap, options: Partial<GeneratorOptions> = {}): GenerationResult {
  return new DeclarationSynthesizer(schemas, options).synthesize();
}
