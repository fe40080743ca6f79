/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  toErrorResponse,
  ApiError,
  ApiErrorOptions,
  asyncHandler,
  AppError,
} from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';
