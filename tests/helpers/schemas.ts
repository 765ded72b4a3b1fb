/**
 * Small builders for schema graphs used across unit tests
 */

import type {
  JsonValue,
  SchemaKind,
  SchemaMap,
  SchemaNode,
  SchemaOrRef,
  SchemaReference,
} from '../../src/types/schema.js';

export function ref(name: string, extra: Omit<SchemaReference, '$ref'> = {}): SchemaReference {
  return { $ref: name, ...extra };
}

export function scalar(kind: SchemaKind, extra: Omit<SchemaNode, 'types'> = {}): SchemaNode {
  return { types: [kind], ...extra };
}

export function str(format?: string, extra: Omit<SchemaNode, 'types' | 'format'> = {}): SchemaNode {
  return format === undefined ? scalar('string', extra) : scalar('string', { format, ...extra });
}

export function enumOf(values: JsonValue[], kind: SchemaKind = 'string'): SchemaNode {
  return { types: [kind], enum: values };
}

export function obj(
  properties: Record<string, SchemaOrRef>,
  extra: Omit<SchemaNode, 'properties'> = {},
): SchemaNode {
  return { types: ['object'], properties: new Map(Object.entries(properties)), ...extra };
}

export function arrayOf(items: SchemaOrRef, extra: Omit<SchemaNode, 'items'> = {}): SchemaNode {
  return { types: ['array'], items, ...extra };
}

export function schemaMap(entries: Array<[string, SchemaOrRef]>): SchemaMap {
  return new Map(entries);
}
