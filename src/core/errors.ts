/**
 * Core error definitions - transport-agnostic
 *
 * This module contains all error classes, codes, and factory functions
 * used by the services, the LLM providers and the CLI.
 */

export class MeetingNotesError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MeetingNotesError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_FILE_PATH: 'E1003',
  SIZE_LIMIT_EXCEEDED: 'E1005',
  UNSUPPORTED_FILE_TYPE: 'E1006',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',

  // Summarization errors (7000-7999)
  SUMMARIZATION_FAILED: 'E7001',
  ACTION_ITEM_EXTRACTION_FAILED: 'E7002',

  // Network/External errors (10000-10999)
  NETWORK_ERROR: 'E10000',
  PROVIDER_ERROR: 'E10001',
  TIMEOUT: 'E10002',
} as const;

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * A language-model call failed: timeout, auth, rate limit, or a malformed or
 * empty response.
 */
export class ProviderError extends MeetingNotesError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly model?: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(`${provider} request failed: ${message}`, ErrorCodes.PROVIDER_ERROR, {
      ...context,
      provider,
      model,
    });
    this.name = 'ProviderError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export type SummarizationStage = 'single-pass' | 'chunk' | 'combine';

/**
 * Summarization aborted. No partial summary is produced.
 */
export class SummarizationFailure extends MeetingNotesError {
  constructor(
    public readonly stage: SummarizationStage,
    cause: unknown,
    public readonly chunkIndex?: number
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = chunkIndex !== undefined ? `${stage} ${chunkIndex}` : stage;
    super(`Failed to generate summary (${where}): ${reason}`, ErrorCodes.SUMMARIZATION_FAILED, {
      stage,
      chunkIndex,
    });
    this.name = 'SummarizationFailure';
    this.cause = cause;
  }
}

/**
 * Action-item extraction aborted on the chunked path.
 */
export class ActionItemExtractionFailure extends MeetingNotesError {
  constructor(
    cause: unknown,
    public readonly chunkIndex?: number
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = chunkIndex !== undefined ? ` (chunk ${chunkIndex})` : '';
    super(
      `Failed to extract action items${where}: ${reason}`,
      ErrorCodes.ACTION_ITEM_EXTRACTION_FAILED,
      { chunkIndex }
    );
    this.name = 'ActionItemExtractionFailure';
    this.cause = cause;
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends MeetingNotesError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, {
      ...context,
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): MeetingNotesError {
  return new MeetingNotesError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.MISSING_REQUIRED_FIELD,
    { field, suggestion }
  );
}

/**
 * Create a size limit exceeded error
 */
export function createSizeLimitError(
  field: string,
  maxSize: number,
  actualSize: number,
  unit: string = 'characters'
): MeetingNotesError {
  return new MeetingNotesError(
    `${field} exceeds maximum ${unit} of ${maxSize} (got ${actualSize})`,
    ErrorCodes.SIZE_LIMIT_EXCEEDED,
    { field, maxSize, actualSize, unit }
  );
}

export function createUnsupportedFileTypeError(
  fileName: string,
  allowed: readonly string[]
): MeetingNotesError {
  return new MeetingNotesError(
    `File type not allowed: ${fileName}. Allowed types: ${allowed.join(', ')}`,
    ErrorCodes.UNSUPPORTED_FILE_TYPE,
    { fileName, allowed: [...allowed] }
  );
}

/**
 * Create a network error for a failed HTTP exchange
 */
export function createNetworkError(
  service: string,
  message: string,
  details?: Record<string, unknown>
): MeetingNotesError {
  return new MeetingNotesError(`${service} request failed: ${message}`, ErrorCodes.NETWORK_ERROR, {
    service,
    ...details,
  });
}

/**
 * Wrap anything a provider SDK throws into a ProviderError.
 * ProviderErrors pass through untouched.
 */
export function createProviderError(provider: string, model: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(message, provider, model, error);
}
