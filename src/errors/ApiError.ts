/**
 * API Error Class Hierarchy
 *
 * Every error a handler can raise maps to an HTTP status code and a
 * machine-readable code.
 *
 * - Not-found and wallet (domain) errors are meant for the client and are
 *   returned verbatim.
 * - Storage faults and configuration defects are operational: they are logged
 *   with context and answered with a generic message.
 *
 * ```typescript
 * throw new AccountNotFoundError('savings');
 * throw new WalletError('No keys have been generated in the wallet');
 * ```
 */

export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

export const ErrorCodes = {
  // Not found errors (404)
  NOT_FOUND: 'NOT_FOUND',
  ACCOUNT_NOT_FOUND: 'ACCOUNT_NOT_FOUND',
  ADDRESS_NOT_FOUND: 'ADDRESS_NOT_FOUND',
  TRANSACTION_NOT_FOUND: 'TRANSACTION_NOT_FOUND',
  BLOCK_NOT_FOUND: 'BLOCK_NOT_FOUND',

  // Validation errors (400)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_PSBT: 'INVALID_PSBT',
  WALLET_ERROR: 'WALLET_ERROR',

  // Internal errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  CONFIGURATION_DEFECT: 'CONFIGURATION_DEFECT',

  // Peer node errors (503)
  NODE_ERROR: 'NODE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base API Error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }

  static isApiError(error: unknown): error is ApiError {
    return error instanceof ApiError;
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode = ErrorCodes.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, 404, code, details);
  }
}

export class AccountNotFoundError extends NotFoundError {
  constructor(name: string) {
    super(`Account ${name} does not exist`, ErrorCodes.ACCOUNT_NOT_FOUND, { account: name });
  }
}

export class AddressNotFoundError extends NotFoundError {
  constructor(account: string, index: number, type: string) {
    super(`Address ${type}/${index} does not exist in account ${account}`, ErrorCodes.ADDRESS_NOT_FOUND, {
      account,
      index,
      type,
    });
  }
}

export class TransactionNotFoundError extends NotFoundError {
  constructor(txid: string) {
    super(`Transaction ${txid} does not exist`, ErrorCodes.TRANSACTION_NOT_FOUND, { txid });
  }
}

export class BlockNotFoundError extends NotFoundError {
  constructor(hash: string) {
    super(`Block ${hash} is not in the header chain`, ErrorCodes.BLOCK_NOT_FOUND, { hash });
  }
}

// =============================================================================
// Client Errors (400)
// =============================================================================

export class ValidationError extends ApiError {
  constructor(
    message: string = 'Invalid input',
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 400, code, details);
  }
}

/**
 * A wallet invariant the request would violate, e.g. a rescan on a wallet
 * without addresses or an import that does not touch the account.
 */
export class WalletError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, ErrorCodes.WALLET_ERROR, details);
  }
}

// =============================================================================
// Server Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 500, code, details);
  }
}

/**
 * Failure of the underlying wallet store. `description` is for the log only.
 */
export class StorageFault extends ApiError {
  readonly description: string;

  constructor(description: string, cause?: unknown) {
    super('A database error occurred', 500, ErrorCodes.DATABASE_ERROR);
    this.description = description;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  /**
   * Wrap a thrown value, keeping client-facing errors as they are
   */
  static from(error: unknown): StorageFault | ApiError {
    if (error instanceof ApiError) return error;
    if (error instanceof Error) return new StorageFault(`${error.name}: ${error.message}`, error);
    return new StorageFault(String(error), error);
  }
}

/**
 * Failure of the peer node behind the node state. `description` is for the
 * log only.
 */
export class NodeFault extends ApiError {
  readonly description: string;

  constructor(description: string, cause?: unknown) {
    super('A peer node error occurred', 503, ErrorCodes.NODE_ERROR);
    this.description = description;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  static from(error: unknown): NodeFault | ApiError {
    if (error instanceof ApiError) return error;
    if (error instanceof Error) return new NodeFault(`${error.name}: ${error.message}`, error);
    return new NodeFault(String(error), error);
  }
}

/**
 * The server was wired in a way no request should ever observe, such as a
 * network operation on a session built without node state.
 */
export class ConfigurationDefect extends ApiError {
  constructor(message: string) {
    super(message, 500, ErrorCodes.CONFIGURATION_DEFECT, undefined, false);
  }
}
