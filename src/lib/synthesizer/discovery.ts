/**
 * Pass 1: classify top-level schemas and discover the inline declarations they introduce
 *
 * Discovery order is the output order: each top-level declaration is followed by
 * the inline declarations it introduced, depth-first in property order.
 */

import type { DeclarationKind } from '../../types/declarations.js';
import { isReference, type SchemaMap, type SchemaNode, type SchemaOrRef } from '../../types/schema.js';
import { canonicalize } from '../naming/index.js';
import {
  baseKind,
  compositionMembers,
  enumLiterals,
  isAggregateShape,
  isEnumeration,
} from '../resolver/formats.js';
import { classifySchema } from './classifier.js';
import type { DiscoveredDeclaration } from './types.js';

export interface DiscoveryResult {
  declarations: DiscoveredDeclaration[];
  /** Top-level raw name → position in `declarations` */
  topLevel: ReadonlyMap<string, number>;
  /** Inline node → position in `declarations` */
  inline: ReadonlyMap<SchemaNode, number>;
}

const NO_RESERVED_WORDS: ReadonlySet<string> = new Set();

/**
 * Pascal-case fragment used to build composite raw names (`Order` + `ShippingAddress`)
 */
function namePiece(raw: string): string {
  return raw.length === 0 ? '' : canonicalize(raw, { style: 'pascal', reservedWords: NO_RESERVED_WORDS });
}

class Discovery {
  readonly declarations: DiscoveredDeclaration[] = [];
  readonly topLevel = new Map<string, number>();
  readonly inline = new Map<SchemaNode, number>();
  // (property name, ordered literals) → position of the shared enumeration
  private readonly enumGroups = new Map<string, number>();

  visitTopLevel(raw: string, schema: SchemaOrRef): void {
    if (isReference(schema)) {
      return;
    }

    const classification = classifySchema(schema);
    if (classification === 'transparent') {
      this.visitMember(schema, raw, '', '', raw);
      return;
    }

    this.topLevel.set(raw, this.add(classification, raw, schema, raw, true));
    if (classification === 'aggregate') {
      this.visitAggregateBody(schema, namePiece(raw), raw);
    }
  }

  private add(
    kind: DeclarationKind,
    raw: string,
    node: SchemaNode,
    scope: string,
    topLevel: boolean,
  ): number {
    this.declarations.push({ kind, raw, node, scope, topLevel });
    return this.declarations.length - 1;
  }

  private visitAggregateBody(node: SchemaNode, owner: string, scope: string): void {
    for (const part of node.allOf ?? []) {
      if (!isReference(part)) {
        this.visitAggregateBody(part, owner, scope);
      }
    }
    for (const [key, property] of node.properties ?? []) {
      this.visitMember(property, key, owner, '', scope);
    }

    const ap = node.additionalProperties;
    if (ap !== undefined && typeof ap !== 'boolean') {
      this.visitMember(ap, 'value', owner, '', scope);
    }
  }

  private visitMember(schema: SchemaOrRef, key: string, owner: string, suffix: string, scope: string): void {
    if (isReference(schema) || this.inline.has(schema)) {
      return;
    }

    if (isEnumeration(schema)) {
      const groupKey = JSON.stringify([key, enumLiterals(schema)]);
      const position = this.enumGroups.get(groupKey) ?? this.add('enumeration', key, schema, scope, false);
      this.enumGroups.set(groupKey, position);
      this.inline.set(schema, position);
      return;
    }

    const composedName = `${owner}${namePiece(key)}${suffix}`;

    if (isAggregateShape(schema)) {
      this.inline.set(schema, this.add('aggregate', composedName, schema, scope, false));
      this.visitAggregateBody(schema, namePiece(composedName), scope);
      return;
    }

    const composition = compositionMembers(schema);
    if (composition !== undefined) {
      const [only] = composition.members;
      if (composition.members.length === 1 && only !== undefined) {
        this.visitMember(only, key, owner, suffix, scope);
      } else if (composition.members.length > 1 && schema.discriminator !== undefined) {
        this.inline.set(schema, this.add('union', composedName, schema, scope, false));
      }
      return;
    }

    const kind = baseKind(schema);
    if (kind === 'array' && schema.items !== undefined) {
      this.visitMember(schema.items, key, owner, `${suffix}Item`, scope);
    } else if (kind === 'object' && schema.additionalProperties !== undefined && typeof schema.additionalProperties !== 'boolean') {
      this.visitMember(schema.additionalProperties, key, owner, `${suffix}Value`, scope);
    }
  }
}

export function discoverDeclarations(schemas: SchemaMap): DiscoveryResult {
  const discovery = new Discovery();
  for (const [raw, schema] of schemas) {
    discovery.visitTopLevel(raw, schema);
  }
  return {
    declarations: discovery.declarations,
    topLevel: discovery.topLevel,
    inline: discovery.inline,
  };
}
