/**
 * Reporter module - JSON reports of a generation run
 */

import fs from 'fs/promises';
import crypto from 'crypto';
import type { GeneratorOptions } from '../../types/config.js';
import type { Declaration, DeclarationKind, GenerationResult } from '../../types/declarations.js';
import { FileIOError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatResolvedType } from '../resolver/describe.js';
import type { GenerationReport, ReportInput, ReportedDeclaration } from './types.js';

export type * from './types.js';

export const TOOL_NAME = 'schemawright';

export function hashSource(source: string): string {
  return crypto.createHash('sha256').update(source).digest('hex');
}

function describeDeclaration(declaration: Declaration): ReportedDeclaration {
  if (declaration.kind !== 'aggregate') {
    return declaration;
  }
  return {
    ...declaration,
    members: declaration.members.map((member) => ({ ...member, typeName: formatResolvedType(member.type) })),
  };
}

/**
 * GenerationReporter turns a GenerationResult into a self-describing JSON report
 */
export class GenerationReporter {
  constructor(
    private readonly version: string = '1.0.0',
    private readonly clock: () => Date = () => new Date(),
  ) {}

  build(result: GenerationResult, input: ReportInput, options: GeneratorOptions): GenerationReport {
    const summary = {
      declarations: result.declarations.length,
      aggregate: 0,
      enumeration: 0,
      union: 0,
      typeAlias: 0,
      diagnostics: result.diagnostics.length,
    };
    for (const declaration of result.declarations) {
      summary[declaration.kind]++;
    }

    const index: Record<string, DeclarationKind> = {};
    for (const [name, kind] of result.index) {
      index[name] = kind;
    }

    const { reservedWords, ...rest } = options;
    const report: GenerationReport = {
      version: this.version,
      tool: { name: TOOL_NAME, version: this.version },
      run: {
        timestamp: this.clock().toISOString(),
        input: { path: input.path, hash: hashSource(input.source) },
      },
      options: { ...rest, reservedWordCount: reservedWords.length },
      summary,
      declarations: result.declarations.map(describeDeclaration),
      index,
      diagnostics: result.diagnostics,
    };

    logger.debug('Report built', { input: input.path, hash: report.run.input.hash });
    return report;
  }

  /**
   * Write the report as JSON
   */
  async save(report: GenerationReport, outputPath: string): Promise<void> {
    try {
      await fs.writeFile(outputPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new FileIOError(`Failed to write report to ${outputPath}`, { outputPath }, { cause: error });
    }
    logger.info('Report saved', { path: outputPath });
  }
}
