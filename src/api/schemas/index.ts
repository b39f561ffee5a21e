/**
 * Validation Schemas Index
 *
 * Central export point for all Zod validation schemas.
 */

// Common schemas
export * from './common';

// Feature-specific schemas
export * from './accounts';
export * from './transactions';
export * from './node';
