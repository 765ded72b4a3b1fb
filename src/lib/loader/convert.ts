/**
 * Conversion of parsed YAML/JSON (maps in document order) into the schema graph
 */

import type {
  Discriminator,
  JsonValue,
  SchemaKind,
  SchemaNode,
  SchemaOrRef,
  SchemaReference,
} from '../../types/schema.js';
import { DocumentError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const SCHEMA_KINDS: readonly SchemaKind[] = ['string', 'integer', 'number', 'boolean', 'array', 'object', 'null'];

const LOCAL_REF_PREFIXES = ['#/components/schemas/', '#/definitions/', '#/$defs/'];

export function isMap(value: unknown): value is Map<unknown, unknown> {
  return value instanceof Map;
}

function isSchemaKind(value: unknown): value is SchemaKind {
  return SCHEMA_KINDS.some((kind) => kind === value);
}

/**
 * Convert a parsed value into plain JSON (maps become objects)
 */
export function toJsonValue(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new DocumentError(`Non-finite number at ${path}`, { path });
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toJsonValue(item, `${path}/${index}`));
  }
  if (isMap(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of value) {
      out[String(key)] = toJsonValue(item, `${path}/${String(key)}`);
    }
    return out;
  }
  throw new DocumentError(`Unsupported value at ${path}`, { path });
}

function hasNonFiniteNumber(value: unknown): boolean {
  if (typeof value === 'number') {
    return !Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.some((item: unknown) => hasNonFiniteNumber(item));
  }
  if (isMap(value)) {
    return [...value.values()].some(hasNonFiniteNumber);
  }
  return false;
}

/**
 * Default or enum literal; values holding a non-finite number have no JSON
 * form and are dropped with a warning
 */
function literalValue(value: unknown, path: string): JsonValue | undefined {
  if (hasNonFiniteNumber(value)) {
    logger.warn('Ignoring non-finite literal', { path });
    return undefined;
  }
  return toJsonValue(value, path);
}

/**
 * Raw schema name of a local reference; other references are kept verbatim
 * and surface later as unresolved.
 */
export function referenceName(ref: string, path: string): string {
  const prefix = LOCAL_REF_PREFIXES.find((candidate) => ref.startsWith(candidate));
  if (prefix === undefined) {
    return ref;
  }

  let token: string;
  try {
    token = decodeURIComponent(ref.slice(prefix.length));
  } catch (error) {
    throw new DocumentError(`Malformed reference "${ref}" at ${path}`, { path, ref }, { cause: error });
  }
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

function stringField(map: Map<unknown, unknown>, key: string, path: string): string | undefined {
  const value = map.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DocumentError(`"${key}" must be a string at ${path}`, { path });
  }
  return value;
}

function listField(map: Map<unknown, unknown>, key: string, path: string): unknown[] | undefined {
  const value = map.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new DocumentError(`"${key}" must be a list at ${path}`, { path });
  }
  return value;
}

function convertTypes(map: Map<unknown, unknown>, path: string): SchemaKind[] | undefined {
  const raw = map.get('type');
  const declared = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];

  const types: SchemaKind[] = [];
  for (const kind of declared) {
    if (!isSchemaKind(kind)) {
      throw new DocumentError(`Unknown type ${JSON.stringify(kind)} at ${path}`, { path });
    }
    types.push(kind);
  }

  // OpenAPI 3.0 spelling of nullability
  if (map.get('nullable') === true && !types.includes('null')) {
    types.push('null');
  }
  return types.length > 0 ? types : undefined;
}

function convertList(map: Map<unknown, unknown>, key: string, path: string): SchemaOrRef[] | undefined {
  return listField(map, key, path)?.map((item, index) => convertSchema(item, `${path}/${key}/${index}`));
}

function convertDiscriminator(value: unknown, path: string): Discriminator {
  if (!isMap(value)) {
    throw new DocumentError(`"discriminator" must be an object at ${path}`, { path });
  }
  const propertyName = stringField(value, 'propertyName', `${path}/discriminator`);
  if (propertyName === undefined) {
    throw new DocumentError(`Discriminator without propertyName at ${path}`, { path });
  }

  const rawMapping = value.get('mapping');
  if (rawMapping === undefined) {
    return { propertyName };
  }
  if (!isMap(rawMapping)) {
    throw new DocumentError(`Discriminator mapping must be an object at ${path}`, { path });
  }

  const mapping = new Map<string, string>();
  for (const [literal, target] of rawMapping) {
    if (typeof target !== 'string') {
      throw new DocumentError(`Discriminator mapping target must be a string at ${path}`, { path });
    }
    // bare names are schema names too
    mapping.set(String(literal), referenceName(target, path));
  }
  return { propertyName, mapping };
}

/**
 * Convert one schema object. Boolean schemas (`true`, `false`) become untyped nodes.
 */
export function convertSchema(value: unknown, path: string): SchemaOrRef {
  if (typeof value === 'boolean') {
    return {};
  }
  if (!isMap(value)) {
    throw new DocumentError(`Schema at ${path} is not an object`, { path });
  }

  const description = stringField(value, 'description', path);
  const ref = value.get('$ref');
  if (ref !== undefined) {
    if (typeof ref !== 'string') {
      throw new DocumentError(`"$ref" must be a string at ${path}`, { path });
    }
    const reference: Mutable<SchemaReference> = { $ref: referenceName(ref, path) };
    const refDefault = value.has('default') ? literalValue(value.get('default'), `${path}/default`) : undefined;
    if (refDefault !== undefined) {
      reference.default = refDefault;
    }
    if (description !== undefined) {
      reference.description = description;
    }
    return reference;
  }

  const node: Mutable<SchemaNode> = {};

  const types = convertTypes(value, path);
  if (types !== undefined) {
    node.types = types;
  }

  const format = stringField(value, 'format', path);
  if (format !== undefined) {
    node.format = format;
  }

  const enumValues = listField(value, 'enum', path);
  if (enumValues !== undefined) {
    const literals: JsonValue[] = [];
    enumValues.forEach((item, index) => {
      const literal = literalValue(item, `${path}/enum/${index}`);
      if (literal !== undefined) {
        literals.push(literal);
      }
    });
    node.enum = literals;
  }

  const required = listField(value, 'required', path);
  if (required !== undefined) {
    node.required = required.map((key) => {
      if (typeof key !== 'string') {
        throw new DocumentError(`"required" entries must be strings at ${path}`, { path });
      }
      return key;
    });
  }

  const properties = value.get('properties');
  if (properties !== undefined) {
    if (!isMap(properties)) {
      throw new DocumentError(`"properties" must be an object at ${path}`, { path });
    }
    const converted = new Map<string, SchemaOrRef>();
    for (const [key, property] of properties) {
      const name = String(key);
      converted.set(name, convertSchema(property, `${path}/properties/${name}`));
    }
    node.properties = converted;
  }

  const additional = value.get('additionalProperties');
  if (typeof additional === 'boolean') {
    node.additionalProperties = additional;
  } else if (additional !== undefined) {
    node.additionalProperties = convertSchema(additional, `${path}/additionalProperties`);
  }

  if (value.has('items')) {
    node.items = convertSchema(value.get('items'), `${path}/items`);
  }

  const allOf = convertList(value, 'allOf', path);
  if (allOf !== undefined) {
    node.allOf = allOf;
  }
  const oneOf = convertList(value, 'oneOf', path);
  if (oneOf !== undefined) {
    node.oneOf = oneOf;
  }
  const anyOf = convertList(value, 'anyOf', path);
  if (anyOf !== undefined) {
    node.anyOf = anyOf;
  }

  if (value.has('discriminator')) {
    node.discriminator = convertDiscriminator(value.get('discriminator'), path);
  }
  const fallback = value.has('default') ? literalValue(value.get('default'), `${path}/default`) : undefined;
  if (fallback !== undefined) {
    node.default = fallback;
  }
  if (description !== undefined) {
    node.description = description;
  }

  return node;
}
