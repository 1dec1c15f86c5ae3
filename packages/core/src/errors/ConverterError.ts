/**
 * ConverterError - Error hierarchy for guji-convert
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - DocumentStructureError: input lacks the body-boundary markers (fatal)
 * - PluginLoadError: plugin module has zero or several implementations (fatal)
 * - LayoutError: an indent leaves no room in a column (error)
 * - FileAccessError: input/output files cannot be read or written (error)
 */

export type Severity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  plugin?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ConverterError
 */
export interface ConverterErrorJSON {
  code: string;
  severity: Severity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all converter errors.
 */
export abstract class ConverterError extends Error {
  abstract readonly code: string;
  abstract readonly severity: Severity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ConverterErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml validation
 *
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends ConverterError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Document structure error - missing \begin{document} / \end{document}
 *
 * Codes: ERR_DOCUMENT_BOUNDARY_MISSING
 */
export class DocumentStructureError extends ConverterError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Plugin load error - module not importable, no implementation, or several
 *
 * Codes: ERR_PLUGIN_NOT_FOUND, ERR_PLUGIN_AMBIGUOUS, ERR_PLUGIN_IMPORT
 */
export class PluginLoadError extends ConverterError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Layout error - indent too large for the grid width
 *
 * Codes: ERR_GRID_TOO_NARROW
 */
export class LayoutError extends ConverterError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable input, unwritable output
 *
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE
 */
export class FileAccessError extends ConverterError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
