import { isReference, type SchemaNode, type SchemaOrRef } from '../../types/schema.js';
import {
  baseKind,
  compositionMembers,
  hasProperties,
  isAggregateShape,
  isEnumeration,
  nonNullKinds,
} from '../resolver/formats.js';
import type { Classification } from './types.js';

/**
 * `type: object` and nothing else; declared as an aggregate without members
 */
export function isEmptyObject(node: SchemaNode): boolean {
  const kinds = nonNullKinds(node);
  return (
    kinds.length === 1 &&
    kinds[0] === 'object' &&
    !hasProperties(node) &&
    (node.additionalProperties === undefined || node.additionalProperties === false) &&
    node.allOf === undefined &&
    node.oneOf === undefined &&
    node.anyOf === undefined
  );
}

/**
 * Decide which declaration, if any, a top-level schema produces.
 *
 * Arrays, maps, aliases of other schemas, single-member compositions and untyped
 * schemas are transparent: references to them are expanded in place.
 */
export function classifySchema(schema: SchemaOrRef): Classification {
  if (isReference(schema)) {
    return 'transparent';
  }
  if (isEnumeration(schema)) {
    return 'enumeration';
  }
  if (isAggregateShape(schema) || isEmptyObject(schema)) {
    return 'aggregate';
  }

  const composition = compositionMembers(schema);
  if (composition !== undefined) {
    return composition.members.length >= 2 ? 'union' : 'transparent';
  }
  if (schema.allOf !== undefined && schema.allOf.length > 0) {
    return 'transparent';
  }

  switch (baseKind(schema)) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
      return 'typeAlias';
    default:
      return 'transparent';
  }
}
