/**
 * Standard error classes for schemawright
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  DOCUMENT_ERROR = "DOCUMENT_ERROR",
  NAME_EXHAUSTION = "NAME_EXHAUSTION",
  SYNTHESIS_ERROR = "SYNTHESIS_ERROR",
}

export class SchemawrightError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SchemawrightError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Raised by the document loader when the input is not a usable OpenAPI document
 */
export class DocumentError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.DOCUMENT_ERROR, message, details, options);
    this.name = "DocumentError";
  }
}

/**
 * No collision-free identifier could be found. Aborts the whole run: emitting a
 * duplicate name would produce output that does not compile.
 */
export class NameExhaustionError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.NAME_EXHAUSTION, message, details, options);
    this.name = "NameExhaustionError";
  }
}
