/**
 * Aggregate assembly: base chains, mixin flattening, member naming, extension data
 */

import type {
  AggregateDeclaration,
  AggregateMember,
  ExtensionDataMember,
} from '../../types/declarations.js';
import { isReference, type SchemaNode } from '../../types/schema.js';
import { renderMemberDefault } from '../literals/index.js';
import { createNameRegistry, type NameRegistry } from '../naming/index.js';
import { OPAQUE } from '../resolver/index.js';
import type { NamedDeclaration, PropertyEntry, SynthesisContext } from './types.js';

interface CollectedProperties {
  entries: PropertyEntry[];
  required: Set<string>;
}

const EXTENSION_DATA_NAME = 'AdditionalProperties';

export class AggregateAssembler {
  // node → raw name of its base schema; undefined when it has none (or the edge was dropped)
  private readonly bases = new Map<SchemaNode, string | undefined>();
  private readonly collected = new Map<SchemaNode, CollectedProperties>();
  private readonly built = new Map<SchemaNode, AggregateDeclaration>();

  constructor(private readonly ctx: SynthesisContext) {}

  /**
   * Assemble the aggregate for `declaration`, assembling its ancestors first
   */
  build(declaration: NamedDeclaration): AggregateDeclaration {
    const existing = this.built.get(declaration.node);
    if (existing) {
      return existing;
    }

    const chain = this.ancestors(declaration.node, declaration.scope).reverse();
    for (const ancestor of chain) {
      if (!this.built.has(ancestor.node)) {
        this.built.set(ancestor.node, this.assemble(ancestor));
      }
    }

    const aggregate = this.assemble(declaration);
    this.built.set(declaration.node, aggregate);
    return aggregate;
  }

  /**
   * Raw name of the first `allOf` reference naming an aggregate schema
   */
  private baseCandidate(node: SchemaNode): string | undefined {
    for (const part of node.allOf ?? []) {
      if (isReference(part) && this.ctx.topLevel(part.$ref)?.kind === 'aggregate') {
        return part.$ref;
      }
    }
    return undefined;
  }

  /**
   * Follow base edges from `node`, memoizing every edge on the way. An edge that
   * would revisit a node on the current path is dropped.
   */
  private baseOf(node: SchemaNode, scope: string): string | undefined {
    const path: SchemaNode[] = [];
    let current: SchemaNode | undefined = node;

    while (current !== undefined && !this.bases.has(current)) {
      path.push(current);
      const raw = this.baseCandidate(current);
      const target = raw !== undefined ? this.ctx.topLevel(raw)?.node : undefined;

      if (raw === undefined || target === undefined) {
        this.bases.set(current, undefined);
        break;
      }
      if (path.includes(target)) {
        this.ctx.diagnostics.report(
          'CompositionCycle',
          `Inheritance of "${raw}" closes a cycle; base dropped`,
          scope,
        );
        this.bases.set(current, undefined);
        break;
      }
      if (path.length > this.ctx.options.maxCompositionDepth) {
        this.ctx.diagnostics.report(
          'CompositionDepthExceeded',
          `Inheritance chain exceeds depth ${this.ctx.options.maxCompositionDepth}; base "${raw}" dropped`,
          scope,
        );
        this.bases.set(current, undefined);
        break;
      }

      this.bases.set(current, raw);
      current = target;
    }

    return this.bases.get(node);
  }

  /**
   * Ancestor declarations, nearest first
   */
  private ancestors(node: SchemaNode, scope: string): NamedDeclaration[] {
    const chain: NamedDeclaration[] = [];
    let raw = this.baseOf(node, scope);
    while (raw !== undefined) {
      const ancestor = this.ctx.topLevel(raw);
      if (ancestor === undefined) {
        break;
      }
      chain.push(ancestor);
      raw = this.baseOf(ancestor.node, scope);
    }
    return chain;
  }

  /**
   * Properties an aggregate declares itself: its own, those of inline `allOf`
   * parts and those of mixin references (with the mixin's ancestors). The base
   * reference contributes nothing here.
   */
  private collect(node: SchemaNode, scope: string): CollectedProperties {
    const cached = this.collected.get(node);
    if (cached) {
      return cached;
    }
    const result: CollectedProperties = { entries: [], required: new Set() };
    this.collectInto(node, scope, this.baseOf(node, scope), [], result);
    this.collected.set(node, result);
    return result;
  }

  private collectInto(
    node: SchemaNode,
    scope: string,
    baseRaw: string | undefined,
    stack: SchemaNode[],
    out: CollectedProperties,
  ): void {
    if (stack.includes(node)) {
      this.ctx.diagnostics.report('CompositionCycle', 'allOf composition revisits a schema on its own path', scope);
      return;
    }
    if (stack.length >= this.ctx.options.maxCompositionDepth) {
      this.ctx.diagnostics.report(
        'CompositionDepthExceeded',
        `allOf composition exceeds depth ${this.ctx.options.maxCompositionDepth}`,
        scope,
      );
      return;
    }

    stack.push(node);
    for (const key of node.required ?? []) {
      out.required.add(key);
    }

    let baseSkipped = false;
    for (const part of node.allOf ?? []) {
      if (!isReference(part)) {
        this.collectInto(part, scope, undefined, stack, out);
        continue;
      }
      if (!baseSkipped && part.$ref === baseRaw) {
        baseSkipped = true;
        continue;
      }
      this.collectMixin(part.$ref, scope, stack, out);
    }

    for (const [key, schema] of node.properties ?? []) {
      out.entries.push({ key, schema });
    }
    stack.pop();
  }

  private collectMixin(raw: string, scope: string, stack: SchemaNode[], out: CollectedProperties): void {
    const target = this.ctx.schemas.get(raw);
    if (target === undefined) {
      this.ctx.diagnostics.report('UnresolvedReference', `allOf references unknown schema "${raw}"`, scope);
      return;
    }
    if (isReference(target) || this.ctx.topLevel(raw)?.kind !== 'aggregate') {
      return;
    }

    for (const ancestor of this.ancestors(target, scope).reverse()) {
      this.collectInto(ancestor.node, scope, this.baseOf(ancestor.node, scope), stack, out);
    }
    this.collectInto(target, scope, this.baseOf(target, scope), stack, out);
  }

  private assemble(declaration: NamedDeclaration): AggregateDeclaration {
    const { node, scope, name } = declaration;
    const { options, resolver } = this.ctx;
    const baseRaw = this.baseOf(node, scope);
    const ancestors = this.ancestors(node, scope);

    const inheritedKeys = new Set<string>();
    const registry = createNameRegistry({
      style: options.namingStyle,
      reservedWords: options.reservedWords,
      fallback: 'Unknown',
    });
    // no differentiated member may land on the enclosing type's name either
    registry.reserve(name);
    let inheritsExtensionData = false;
    for (const ancestor of ancestors) {
      for (const entry of this.collect(ancestor.node, scope).entries) {
        inheritedKeys.add(entry.key);
      }
      const built = this.built.get(ancestor.node);
      for (const member of built?.members ?? []) {
        registry.reserve(member.name, member.jsonName);
      }
      if (built?.extensionData) {
        registry.reserve(built.extensionData.name);
        inheritsExtensionData = true;
      }
    }

    const collected = this.collect(node, scope);
    const seen = new Set<string>();
    const entries = collected.entries.filter((entry) => {
      if (inheritedKeys.has(entry.key) || seen.has(entry.key)) {
        return false;
      }
      seen.add(entry.key);
      return true;
    });

    const memberNames = registry.allocate(
      entries.map((entry) => entry.key),
      (raw) => memberCanonical(registry, raw, name),
    );
    const members = entries.map((entry, index): AggregateMember => {
      const mandatory = collected.required.has(entry.key);
      const type = resolver.withScope(scope, () => resolver.resolve(entry.schema, mandatory));
      return {
        name: memberNames[index],
        jsonName: entry.key,
        type,
        mandatory,
        default: renderMemberDefault(entry.schema.default, type, this.ctx.literals, options.propagateDefaults),
        description: entry.schema.description,
      };
    });

    let extensionData: ExtensionDataMember | undefined;
    const ap = node.additionalProperties;
    if (collected.entries.length > 0 && ap !== undefined && ap !== false && !inheritsExtensionData) {
      extensionData = {
        name: registry.claim(memberCanonical(registry, EXTENSION_DATA_NAME, name)),
        valueType: ap === true ? OPAQUE : resolver.withScope(scope, () => resolver.resolve(ap)),
      };
    }

    return {
      kind: 'aggregate',
      name,
      sourceName: declaration.raw,
      base: baseRaw !== undefined ? this.ctx.topLevel(baseRaw)?.name : undefined,
      members,
      extensionData,
      description: node.description,
    };
  }
}

/**
 * Member identifier for `raw`; a member may not share its enclosing type's name
 */
function memberCanonical(registry: NameRegistry, raw: string, typeName: string): string {
  const canonical = registry.canonicalize(raw);
  return canonical === typeName ? `${canonical}Value` : canonical;
}
