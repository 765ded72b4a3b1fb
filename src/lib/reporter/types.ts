/**
 * Reporter module types
 */

import type { GeneratorOptions } from '../../types/config.js';
import type {
  AggregateDeclaration,
  AggregateMember,
  Declaration,
  DeclarationKind,
  Diagnostic,
} from '../../types/declarations.js';

export interface ReportInput {
  path: string;
  /** Raw document text; only its SHA-256 is reported */
  source: string;
}

export type ReportedMember = AggregateMember & { typeName: string };

/** Declaration as written to the report; aggregate members carry their C# type spelling */
export type ReportedDeclaration =
  | Exclude<Declaration, { kind: 'aggregate' }>
  | (Omit<AggregateDeclaration, 'members'> & { kind: 'aggregate'; members: ReportedMember[] });

export interface GenerationReport {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    timestamp: string;
    input: {
      path: string;
      hash: string;
    };
  };
  options: Omit<GeneratorOptions, 'reservedWords'> & { reservedWordCount: number };
  summary: Record<DeclarationKind, number> & { declarations: number; diagnostics: number };
  declarations: ReportedDeclaration[];
  index: Record<string, DeclarationKind>;
  diagnostics: readonly Diagnostic[];
}
