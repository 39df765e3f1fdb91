import { MeetingNotesError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface MappedError {
  message: string;
  code: string;
  /** HTTP-style status hint */
  statusCode: number;
  details?: Record<string, unknown>;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCodes.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCodes.INVALID_FILE_PATH]: 400,
  [ErrorCodes.SIZE_LIMIT_EXCEEDED]: 400,
  [ErrorCodes.UNSUPPORTED_FILE_TYPE]: 400,
  [ErrorCodes.UNKNOWN_ERROR]: 500,
  [ErrorCodes.INTERNAL_ERROR]: 500,
  [ErrorCodes.SUMMARIZATION_FAILED]: 502,
  [ErrorCodes.ACTION_ITEM_EXTRACTION_FAILED]: 502,
  [ErrorCodes.NETWORK_ERROR]: 502,
  [ErrorCodes.PROVIDER_ERROR]: 502,
  [ErrorCodes.TIMEOUT]: 504,
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(STATUS_BY_CODE, code);
}

function statusFor(code: string): number {
  return isErrorCode(code) ? STATUS_BY_CODE[code] : 500;
}

/**
 * Normalize anything thrown into `{ message, code, statusCode, details }`.
 * The message of a wrapped cause is surfaced as `details.cause`.
 */
export function mapError(error: unknown): MappedError {
  if (error instanceof MeetingNotesError) {
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    const details = cause ? { ...error.context, cause } : error.context;
    return {
      message: error.message,
      code: error.code,
      statusCode: statusFor(error.code),
      ...(details ? { details } : {}),
    };
  }

  if (error instanceof Error) {
    // fs errors from reading a transcript or audio file
    if (error.message.includes('ENOENT') || error.message.includes('no such file')) {
      return { message: error.message, code: ErrorCodes.INVALID_FILE_PATH, statusCode: 400 };
    }

    logger.warn({ error: error.message }, 'Unmapped internal error');
    return { message: error.message, code: ErrorCodes.INTERNAL_ERROR, statusCode: 500 };
  }

  const message = String(error);
  logger.warn({ error: message }, 'Unmapped unknown error');
  return { message, code: ErrorCodes.UNKNOWN_ERROR, statusCode: 500 };
}
