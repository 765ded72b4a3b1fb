/**
 * Input schema graph
 *
 * The loader (or any other parser) builds this graph once; every stage after it
 * treats the nodes as read-only. Ordered collections are `ReadonlyMap`s so that
 * document order survives keys such as "200" that plain objects would reorder.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type SchemaKind =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'array'
  | 'object'
  | 'null';

export interface Discriminator {
  readonly propertyName: string;
  /** Discriminator literal → raw name of the target schema */
  readonly mapping?: ReadonlyMap<string, string>;
}

export interface SchemaNode {
  /** Kind flags; `null` next to another kind marks the node nullable */
  readonly types?: readonly SchemaKind[];
  readonly format?: string;
  readonly enum?: readonly JsonValue[];
  readonly required?: readonly string[];
  readonly properties?: ReadonlyMap<string, SchemaOrRef>;
  readonly additionalProperties?: SchemaOrRef | boolean;
  readonly items?: SchemaOrRef;
  readonly allOf?: readonly SchemaOrRef[];
  readonly oneOf?: readonly SchemaOrRef[];
  readonly anyOf?: readonly SchemaOrRef[];
  readonly discriminator?: Discriminator;
  readonly default?: JsonValue;
  readonly description?: string;
}

/**
 * Reference to a top-level schema by its raw name. OpenAPI 3.1 allows
 * `default` and `description` next to `$ref`, so they are kept.
 */
export interface SchemaReference {
  readonly $ref: string;
  readonly default?: JsonValue;
  readonly description?: string;
}

export type SchemaOrRef = SchemaNode | SchemaReference;

/** Raw schema name → node, in document order */
export type SchemaMap = ReadonlyMap<string, SchemaOrRef>;

export function isReference(schema: SchemaOrRef): schema is SchemaReference {
  return '$ref' in schema && typeof schema.$ref === 'string';
}
