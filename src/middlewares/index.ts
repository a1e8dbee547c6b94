/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  asyncHandler,
  AppError,
} from './errorHandler';
