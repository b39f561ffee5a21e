/**
 * Error Module Exports
 */

export * from './ApiError';
export { errorHandler, asyncHandler, notFoundHandler, formatZodError } from './errorHandler';
