/**
 * Type Resolver - maps a schema node to a ResolvedType
 *
 * Stateless apart from the reference-expansion path and the diagnostic scope.
 * Names of declarations come from a lookup supplied by the synthesizer.
 */

import type { GeneratorOptions } from '../../types/config.js';
import type { Mutability, PrimitiveKind, ResolvedType } from '../../types/declarations.js';
import { isReference, type SchemaMap, type SchemaNode, type SchemaOrRef } from '../../types/schema.js';
import type { DiagnosticCollector } from '../diagnostics/index.js';
import {
  baseKind,
  compositionMembers,
  hasNonNullDefault,
  isAggregateShape,
  isEnumeration,
  isNullableNode,
  primitiveFor,
} from './formats.js';

export * from './formats.js';
export { formatResolvedType } from './describe.js';

export interface DeclarationLookup {
  /** Declaration name of a top-level schema, or undefined when it declares nothing */
  declarationName(raw: string): string | undefined;
  /** Name synthesized for an inline enumeration, aggregate or discriminated union node */
  inlineName(node: SchemaNode): string | undefined;
}

export const OPAQUE: ResolvedType = { kind: 'primitive', primitive: 'object' };

export function primitive(kind: PrimitiveKind): ResolvedType {
  return { kind: 'primitive', primitive: kind };
}

export function nullable(inner: ResolvedType): ResolvedType {
  return inner.kind === 'nullable' ? inner : { kind: 'nullable', inner };
}

export function unwrapNullable(type: ResolvedType): ResolvedType {
  return type.kind === 'nullable' ? type.inner : type;
}

export function isOpaque(type: ResolvedType): boolean {
  const inner = unwrapNullable(type);
  return inner.kind === 'primitive' && inner.primitive === 'object';
}

export class TypeResolver {
  // raw names of transparent schemas currently being expanded
  private readonly path: string[] = [];
  private scope: string | undefined;

  constructor(
    private readonly schemas: SchemaMap,
    private readonly lookup: DeclarationLookup,
    private readonly options: GeneratorOptions,
    private readonly diagnostics: DiagnosticCollector,
  ) {}

  /**
   * Run `fn` with diagnostics attributed to `schema`
   */
  withScope<T>(schema: string, fn: () => T): T {
    const previous = this.scope;
    this.scope = schema;
    try {
      return fn();
    } finally {
      this.scope = previous;
    }
  }

  /**
   * Resolve the type of `schema` as a member that is (or is not) in its owner's
   * required set. Top-level and item schemas are resolved as required.
   */
  resolve(schema: SchemaOrRef, required = true): ResolvedType {
    const type = this.resolveCore(schema);
    return this.isMemberNullable(schema, required) ? nullable(type) : type;
  }

  /**
   * Nullability contributed by the owning member, independent of the node's own null kind
   */
  isMemberNullable(schema: SchemaOrRef, required: boolean): boolean {
    if (isNullableNode(schema)) {
      return true;
    }
    if (required) {
      return false;
    }
    return !(this.options.defaultNonNullable && hasNonNullDefault(schema));
  }

  mutability(kind: 'array' | 'map'): Mutability {
    const immutable = kind === 'array' ? this.options.immutableArrays : this.options.immutableMaps;
    return immutable ? 'readonly' : 'mutable';
  }

  /**
   * Resolve a reference by raw schema name
   */
  resolveReference(raw: string): ResolvedType {
    const name = this.lookup.declarationName(raw);
    const target = this.schemas.get(raw);
    if (name !== undefined) {
      const reference: ResolvedType = { kind: 'reference', name };
      return target !== undefined && isNullableNode(target) ? nullable(reference) : reference;
    }

    if (target === undefined) {
      this.diagnostics.report('UnresolvedReference', `Reference to unknown schema "${raw}"`, this.scope);
      return OPAQUE;
    }

    if (this.path.includes(raw)) {
      this.diagnostics.report(
        'CompositionCycle',
        `Cycle through "${[...this.path, raw].join(' -> ')}" replaced by an opaque type`,
        this.scope,
      );
      return OPAQUE;
    }
    if (this.path.length >= this.options.maxCompositionDepth) {
      this.diagnostics.report(
        'CompositionDepthExceeded',
        `Expansion of "${raw}" exceeds depth ${this.options.maxCompositionDepth}`,
        this.scope,
      );
      return OPAQUE;
    }

    this.path.push(raw);
    try {
      return this.resolveCore(target);
    } finally {
      this.path.pop();
    }
  }

  private resolveCore(schema: SchemaOrRef): ResolvedType {
    if (isReference(schema)) {
      return this.resolveReference(schema.$ref);
    }
    const type = this.resolveNode(schema);
    return isNullableNode(schema) ? nullable(type) : type;
  }

  private inlineReference(node: SchemaNode): ResolvedType | undefined {
    const name = this.lookup.inlineName(node);
    return name !== undefined ? { kind: 'reference', name } : undefined;
  }

  private resolveNode(node: SchemaNode): ResolvedType {
    // placeholder unless the synthesizer declared an inline aggregate for this node
    if (isAggregateShape(node)) {
      return this.inlineReference(node) ?? OPAQUE;
    }

    if (node.allOf !== undefined && node.allOf.length > 0) {
      const [first] = node.allOf;
      const refs = node.allOf.filter(isReference);
      const [ref] = refs;
      if (refs.length === 1 && ref !== undefined) {
        return this.resolveReference(ref.$ref);
      }
      if (node.allOf.length === 1 && first !== undefined) {
        return this.resolveCore(first);
      }
      return OPAQUE;
    }

    const composition = compositionMembers(node);
    if (composition !== undefined) {
      const type = this.resolveComposition(node, composition.members);
      return composition.nullable ? nullable(type) : type;
    }

    if (isEnumeration(node)) {
      const reference = this.inlineReference(node);
      if (reference !== undefined) {
        return reference;
      }
    }

    const kind = baseKind(node);
    switch (kind) {
      case undefined:
      case 'null':
        return OPAQUE;
      case 'array':
        return {
          kind: 'collection',
          element: node.items !== undefined ? this.resolveCore(node.items) : OPAQUE,
          mutability: this.mutability('array'),
        };
      case 'object':
        return this.resolveObject(node);
      default:
        return primitive(primitiveFor(kind, node.format) ?? 'object');
    }
  }

  private resolveComposition(node: SchemaNode, members: readonly SchemaOrRef[]): ResolvedType {
    const [first] = members;
    if (members.length === 1 && first !== undefined) {
      return this.resolveCore(first);
    }
    if (members.length > 1 && node.discriminator !== undefined) {
      return this.inlineReference(node) ?? OPAQUE;
    }
    return OPAQUE;
  }

  private resolveObject(node: SchemaNode): ResolvedType {
    const ap = node.additionalProperties;
    if (ap === undefined || ap === false) {
      return OPAQUE;
    }
    return {
      kind: 'map',
      value: ap === true ? OPAQUE : this.resolveCore(ap),
      mutability: this.mutability('map'),
    };
  }
}

export function createTypeResolver(
  schemas: SchemaMap,
  lookup: DeclarationLookup,
  options: GeneratorOptions,
  diagnostics: DiagnosticCollector,
): TypeResolver {
  return new TypeResolver(schemas, lookup, options, diagnostics);
}
