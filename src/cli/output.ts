/**
 * Shared command output: JSON results on stdout, JSON errors on stderr
 */

import { ErrorCode, SchemawrightError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const EXIT_CODES: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.CONFIG_ERROR]: 2,
  [ErrorCode.DOCUMENT_ERROR]: 3,
  [ErrorCode.FILE_IO_ERROR]: 4,
};

export function printResult(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print `error` as a JSON error response and set the process exit code
 */
export function handleCommandError(error: unknown, phase: string): void {
  const schemawrightError =
    error instanceof SchemawrightError
      ? error
      : new SchemawrightError(
          ErrorCode.GENERAL_ERROR,
          error instanceof Error ? error.message : String(error),
          undefined,
          { cause: error },
        );

  logger.error(`${phase} failed`, { code: schemawrightError.code });
  console.error(JSON.stringify(schemawrightError.toResponse(phase), null, 2));
  process.exitCode = EXIT_CODES[schemawrightError.code] ?? 1;
}
