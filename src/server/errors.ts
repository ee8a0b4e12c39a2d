/**
 * MCP Server Error Handling
 *
 * Every tool failure is reported as an MCPError with a category clients can
 * switch on. Service-level error classes are mapped to categories by name.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Routing errors
  | 'UNSUPPORTED_FORMAT'

  // Capability / extraction errors
  | 'CAPABILITY_UNAVAILABLE'
  | 'EXTRACTION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'WORKER_ERROR'
  | 'WORKER_TIMEOUT'

  // Pipeline state
  | 'PIPELINE_NOT_READY'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'
  | 'PERMISSION_DENIED'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 *
 * WorkerError carries its own `.code` (WORKER_TIMEOUT vs WORKER_ERROR) and is
 * resolved in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  UnsupportedFormatError: 'UNSUPPORTED_FORMAT',
  CapabilityUnavailableError: 'CAPABILITY_UNAVAILABLE',
  ExtractionFailedError: 'EXTRACTION_FAILED',
  EmbeddingError: 'EMBEDDING_FAILED',
  WorkerError: 'WORKER_ERROR',
};

/**
 * Node.js fs error codes mapped to categories
 */
const FS_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  ENOENT: 'PATH_NOT_FOUND',
  ENOTDIR: 'PATH_NOT_DIRECTORY',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
};

function readStringField(error: Error, field: 'code'): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const code = readStringField(error, 'code');
      let category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      if (error.name === 'WorkerError' && code === 'WORKER_TIMEOUT') {
        category = 'WORKER_TIMEOUT';
      } else if (error.name === 'WorkerError' && code === 'CAPABILITY_UNAVAILABLE') {
        category = 'CAPABILITY_UNAVAILABLE';
      } else if (code && FS_CODE_TO_CATEGORY[code]) {
        category = FS_CODE_TO_CATEGORY[code];
      }

      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function pipelineNotReadyError(): MCPError {
  return new MCPError(
    'PIPELINE_NOT_READY',
    'Extraction pipeline is not initialized. Capabilities are probed at server start.'
  );
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotFileError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path is not a file: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}
