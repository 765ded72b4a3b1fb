/**
 * Non-fatal diagnostics collected during one generation run
 */

import type { Diagnostic, DiagnosticCode } from '../../types/declarations.js';
import { logger } from '../../utils/logger.js';

export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly seen = new Set<string>();

  /**
   * Record a diagnostic. Identical reports (same code, schema and message) are
   * kept once, since the same shape is often reached from several members.
   */
  report(code: DiagnosticCode, message: string, schema?: string): void {
    const key = `${code}\u0000${schema ?? ''}\u0000${message}`;
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);

    const diagnostic: Diagnostic = schema === undefined ? { code, message } : { code, message, schema };
    this.entries.push(diagnostic);
    logger.warn(message, { code, schema });
  }

  list(): readonly Diagnostic[] {
    return this.entries;
  }

  count(code?: DiagnosticCode): number {
    return code === undefined
      ? this.entries.length
      : this.entries.filter((entry) => entry.code === code).length;
  }
}
