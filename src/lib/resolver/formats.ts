/**
 * Format table and schema-shape predicates shared by the resolver and synthesizer
 */

import type { PrimitiveKind } from '../../types/declarations.js';
import {
  isReference,
  type JsonValue,
  type SchemaKind,
  type SchemaNode,
  type SchemaOrRef,
} from '../../types/schema.js';

const STRING_FORMATS: Readonly<Record<string, PrimitiveKind>> = {
  'date-time': 'dateTime',
  date: 'date',
  time: 'time',
  duration: 'duration',
  uuid: 'uuid',
  uri: 'uri',
  byte: 'bytes',
  binary: 'stream',
};

const INTEGER_FORMATS: Readonly<Record<string, PrimitiveKind>> = {
  int32: 'int32',
  int64: 'int64',
};

const NUMBER_FORMATS: Readonly<Record<string, PrimitiveKind>> = {
  float: 'float',
  double: 'double',
  decimal: 'decimal',
};

function lookupFormat(
  table: Readonly<Record<string, PrimitiveKind>>,
  format: string | undefined,
  fallback: PrimitiveKind,
): PrimitiveKind {
  if (format === undefined) {
    return fallback;
  }
  return table[format.toLowerCase()] ?? fallback;
}

/**
 * Map a primitive schema kind plus format to a primitive type
 */
export function primitiveFor(kind: SchemaKind, format?: string): PrimitiveKind | undefined {
  switch (kind) {
    case 'string':
      return lookupFormat(STRING_FORMATS, format, 'string');
    case 'integer':
      return lookupFormat(INTEGER_FORMATS, format, 'int32');
    case 'number':
      return lookupFormat(NUMBER_FORMATS, format, 'double');
    case 'boolean':
      return 'boolean';
    default:
      return undefined;
  }
}

export function nonNullKinds(node: SchemaNode): SchemaKind[] {
  return (node.types ?? []).filter((kind) => kind !== 'null');
}

export function isNullableNode(schema: SchemaOrRef): boolean {
  return !isReference(schema) && (schema.types ?? []).includes('null');
}

/**
 * A schema that only admits `null`, like the second member of `anyOf: [T, {type: null}]`
 */
export function isNullSchema(schema: SchemaOrRef): boolean {
  if (isReference(schema)) {
    return false;
  }
  const types = schema.types ?? [];
  return (
    types.length > 0 &&
    types.every((kind) => kind === 'null') &&
    schema.allOf === undefined &&
    schema.oneOf === undefined &&
    schema.anyOf === undefined &&
    schema.properties === undefined &&
    schema.items === undefined
  );
}

/**
 * Single non-null kind, inferring `object` / `array` from structure when the
 * node declares no type. Undefined when absent or ambiguous.
 */
export function baseKind(node: SchemaNode): SchemaKind | undefined {
  const kinds = nonNullKinds(node);
  if (kinds.length === 1) {
    return kinds[0];
  }
  if (kinds.length > 1) {
    return undefined;
  }
  if (node.properties !== undefined || node.additionalProperties !== undefined) {
    return 'object';
  }
  if (node.items !== undefined) {
    return 'array';
  }
  return undefined;
}

export function hasProperties(node: SchemaNode): boolean {
  return (node.properties?.size ?? 0) > 0;
}

/**
 * `allOf` that builds an object: several references, or an inline part with properties
 */
export function isObjectComposing(node: SchemaNode): boolean {
  const parts = node.allOf ?? [];
  if (parts.length === 0) {
    return false;
  }
  if (parts.filter(isReference).length >= 2) {
    return true;
  }
  return parts.some((part) => !isReference(part) && (hasProperties(part) || isObjectComposing(part)));
}

export function isAggregateShape(node: SchemaNode): boolean {
  return hasProperties(node) || isObjectComposing(node);
}

/**
 * Non-null enumeration literals, in declaration order
 */
export function enumLiterals(node: SchemaNode): Array<string | number> {
  const literals: Array<string | number> = [];
  for (const value of node.enum ?? []) {
    if (typeof value === 'string' || typeof value === 'number') {
      literals.push(value);
    }
  }
  return literals;
}

/**
 * Underlying kind of an enumeration node, or undefined when the node is not one.
 * Untyped enums are accepted when every literal has the same kind.
 */
export function enumerationKind(node: SchemaNode): 'string' | 'integer' | undefined {
  const literals = enumLiterals(node);
  if (literals.length === 0) {
    return undefined;
  }

  const kind = baseKind(node);
  if (kind === 'string' && literals.every((value) => typeof value === 'string')) {
    return 'string';
  }
  if (kind === 'integer' && literals.every((value) => Number.isInteger(value))) {
    return 'integer';
  }
  if (kind === undefined && nonNullKinds(node).length === 0) {
    if (literals.every((value) => typeof value === 'string')) {
      return 'string';
    }
    if (literals.every((value) => Number.isInteger(value))) {
      return 'integer';
    }
  }
  return undefined;
}

export function isEnumeration(node: SchemaNode): boolean {
  return enumerationKind(node) !== undefined;
}

/**
 * Object with open additional properties and no declared properties
 */
export function isMapOnly(node: SchemaNode): boolean {
  const ap = node.additionalProperties;
  return !hasProperties(node) && ap !== undefined && ap !== false && baseKind(node) === 'object';
}

export interface CompositionMembers {
  keyword: 'oneOf' | 'anyOf';
  /** Members with `null`-only schemas removed */
  members: SchemaOrRef[];
  /** A `null`-only member was removed */
  nullable: boolean;
}

export function compositionMembers(node: SchemaNode): CompositionMembers | undefined {
  const keyword = (node.oneOf?.length ?? 0) > 0 ? 'oneOf' : (node.anyOf?.length ?? 0) > 0 ? 'anyOf' : undefined;
  if (keyword === undefined) {
    return undefined;
  }

  const all = (keyword === 'oneOf' ? node.oneOf : node.anyOf) ?? [];
  const members = all.filter((member) => !isNullSchema(member));
  return { keyword, members, nullable: members.length < all.length };
}

export function hasNonNullDefault(schema: SchemaOrRef): boolean {
  const value: JsonValue | undefined = schema.default;
  return value !== undefined && value !== null;
}
