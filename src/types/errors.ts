/**
 * Error Codes for the ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  INVALID_AMOUNT = 2002,

  // Business errors (3xxx)
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_AMOUNT]: 400,

  // Business errors -> 404
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // System errors -> 500
  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    timestamp: string;
    correlationId?: string;
  };
}
