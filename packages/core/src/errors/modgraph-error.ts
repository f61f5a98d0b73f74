/**
 * Modgraph Errors
 *
 * Structured errors with:
 * - Consistent error codes
 * - Recovery suggestions for the CLI layer
 *
 * Only PATH_NOT_FOUND and UNSUPPORTED_FILE abort a scan. Parse failures are
 * recorded on the module and counted; unresolvable imports and abandoned
 * cycle candidates are not errors at all.
 */

export enum ModgraphErrorCode {
  // Scan-aborting
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
  UNSUPPORTED_FILE = 'UNSUPPORTED_FILE',

  // Per-module, recovered by the scanner
  PARSE_FAILURE = 'PARSE_FAILURE',

  // Query and input errors
  MODULE_NOT_FOUND = 'MODULE_NOT_FOUND',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export interface RecoveryHint {
  suggestion: string;
  command?: string | undefined;
}

export interface ModgraphErrorDetails {
  code: ModgraphErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
  cause?: unknown;
}

export class ModgraphError extends Error {
  public readonly code: ModgraphErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: ModgraphErrorDetails) {
    super(errorDetails.message, errorDetails.cause === undefined ? undefined : { cause: errorDetails.cause });
    this.name = 'ModgraphError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }
}

/**
 * Type guard for modgraph errors, optionally narrowed to one code
 */
export function isModgraphError(error: unknown, code?: ModgraphErrorCode): error is ModgraphError {
  return error instanceof ModgraphError && (code === undefined || error.code === code);
}

/**
 * Error factory functions for common errors
 */
export const Errors = {
  pathNotFound(path: string): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.PATH_NOT_FOUND,
      message: `Path not found: ${path}`,
      details: { path },
      recovery: { suggestion: 'Check that the project root exists and is readable' },
    });
  },

  unsupportedFile(path: string): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.UNSUPPORTED_FILE,
      message: `Not a Python file: ${path}`,
      details: { path },
      recovery: { suggestion: 'Pass a project directory or a single .py file' },
    });
  },

  parseFailure(file: string, line: number, reason: string): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.PARSE_FAILURE,
      message: `Syntax error: line ${line}: ${reason}`,
      details: { file, line, reason },
    });
  },

  readFailure(file: string, cause: unknown): ModgraphError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ModgraphError({
      code: ModgraphErrorCode.PARSE_FAILURE,
      message: `Read error: ${reason}`,
      details: { file },
      cause,
    });
  },

  moduleNotFound(moduleId: string): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.MODULE_NOT_FOUND,
      message: `Module not found: ${moduleId}`,
      details: { moduleId },
      recovery: { suggestion: 'List known modules', command: 'modgraph metrics <path> --sort name' },
    });
  },

  invalidArgument(param: string, reason: string, suggestion?: string): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.INVALID_ARGUMENT,
      message: `Invalid ${param}: ${reason}`,
      details: { param, reason },
      recovery: suggestion ? { suggestion } : undefined,
    });
  },

  configInvalid(file: string, issues: string[]): ModgraphError {
    return new ModgraphError({
      code: ModgraphErrorCode.CONFIG_INVALID,
      message: `Invalid configuration in ${file}: ${issues.join('; ')}`,
      details: { file, issues },
    });
  },
};
