/**
 * Output model: resolved type references and the declaration set handed to an emitter
 */

export type PrimitiveKind =
  | 'string'
  | 'int32'
  | 'int64'
  | 'float'
  | 'double'
  | 'decimal'
  | 'boolean'
  | 'dateTime'
  | 'date'
  | 'time'
  | 'duration'
  | 'uuid'
  | 'uri'
  | 'bytes'
  | 'stream'
  | 'object'; // opaque placeholder / fallback

export type Mutability = 'readonly' | 'mutable';

export type ResolvedType =
  | { readonly kind: 'primitive'; readonly primitive: PrimitiveKind }
  | { readonly kind: 'collection'; readonly element: ResolvedType; readonly mutability: Mutability }
  | { readonly kind: 'map'; readonly value: ResolvedType; readonly mutability: Mutability }
  | { readonly kind: 'reference'; readonly name: string }
  | { readonly kind: 'nullable'; readonly inner: ResolvedType };

export type DefaultExpressionKind =
  | 'literal'
  | 'construct'
  | 'enumMember'
  | 'emptyCollection'
  | 'placeholder';

export interface DefaultExpression {
  readonly kind: DefaultExpressionKind;
  /** Target-language source of the expression */
  readonly code: string;
}

export interface AggregateMember {
  readonly name: string;
  /** Original property key, used for serialization */
  readonly jsonName: string;
  readonly type: ResolvedType;
  readonly mandatory: boolean;
  readonly default?: DefaultExpression;
  readonly description?: string;
}

/** Catch-all member collecting keys that have no declared property */
export interface ExtensionDataMember {
  readonly name: string;
  readonly valueType: ResolvedType;
}

export interface AggregateDeclaration {
  readonly kind: 'aggregate';
  readonly name: string;
  readonly sourceName: string;
  readonly base?: string;
  readonly members: readonly AggregateMember[];
  readonly extensionData?: ExtensionDataMember;
  readonly description?: string;
}

export interface EnumerationMember {
  readonly name: string;
  readonly value: string | number;
}

export interface EnumerationDeclaration {
  readonly kind: 'enumeration';
  readonly name: string;
  readonly sourceName: string;
  readonly underlying: 'string' | 'integer';
  readonly members: readonly EnumerationMember[];
  readonly description?: string;
}

export interface UnionVariant {
  readonly declaration: string;
  readonly discriminatorValue?: string;
}

export interface UnionDeclaration {
  readonly kind: 'union';
  readonly name: string;
  readonly sourceName: string;
  /** `abstract` when tagged by a discriminator; `open` means consumers fall back to an opaque type */
  readonly marker: 'abstract' | 'open';
  readonly discriminator?: string;
  readonly variants: readonly UnionVariant[];
  readonly description?: string;
}

export interface TypeAliasDeclaration {
  readonly kind: 'typeAlias';
  readonly name: string;
  readonly sourceName: string;
  readonly type: ResolvedType;
  readonly description?: string;
}

export type Declaration =
  | AggregateDeclaration
  | EnumerationDeclaration
  | UnionDeclaration
  | TypeAliasDeclaration;

export type DeclarationKind = Declaration['kind'];

export type DiagnosticCode =
  | 'CompositionCycle'
  | 'CompositionDepthExceeded'
  | 'UnresolvedDiscriminatorTarget'
  | 'UnresolvedReference'
  | 'UnsupportedUnionMember';

export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Raw name of the schema being synthesized when the diagnostic was raised */
  readonly schema?: string;
}

export interface GenerationResult {
  readonly declarations: readonly Declaration[];
  readonly index: ReadonlyMap<string, DeclarationKind>;
  readonly diagnostics: readonly Diagnostic[];
}
