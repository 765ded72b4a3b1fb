/**
 * Synthesizer module types
 */

import type { GeneratorOptions } from '../../types/config.js';
import type { DeclarationKind } from '../../types/declarations.js';
import type { SchemaMap, SchemaNode, SchemaOrRef } from '../../types/schema.js';
import type { DiagnosticCollector } from '../diagnostics/index.js';
import type { LiteralContext } from '../literals/index.js';
import type { TypeResolver } from '../resolver/index.js';

/** Top-level schemas classified `transparent` produce no declaration of their own */
export type Classification = DeclarationKind | 'transparent';

export interface DiscoveredDeclaration {
  kind: DeclarationKind;
  /** Raw name handed to the name registry */
  raw: string;
  node: SchemaNode;
  /** Raw name of the top-level schema that introduced this declaration */
  scope: string;
  topLevel: boolean;
}

export interface NamedDeclaration extends DiscoveredDeclaration {
  name: string;
}

export interface PropertyEntry {
  /** Original property key */
  key: string;
  schema: SchemaOrRef;
}

export interface SynthesisContext {
  schemas: SchemaMap;
  options: GeneratorOptions;
  diagnostics: DiagnosticCollector;
  resolver: TypeResolver;
  literals: LiteralContext;
  /** Declaration introduced by a top-level schema, of any kind */
  topLevel(raw: string): NamedDeclaration | undefined;
}
