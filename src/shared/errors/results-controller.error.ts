/**
 * Results Controller Error
 *
 * Standardized error classification for controller, cache and diff operations.
 * Provides error codes for programmatic handling and detailed messages for debugging.
 */

/**
 * Error codes for results controller operations
 */
export type ResultsControllerErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'QUERY_EXECUTION_FAILED'
  | 'CACHE_IO_ERROR'
  | 'PRECONDITION_VIOLATION'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_STATE';

/**
 * Standardized error for results controller operations.
 *
 * @example
 * ```typescript
 * try {
 *   ResultsController.deleteCache('inbox');
 * } catch (error) {
 *   if (error instanceof ResultsControllerError) {
 *     switch (error.code) {
 *       case 'PRECONDITION_VIOLATION':
 *         console.error('Close the controller before deleting its cache');
 *         break;
 *       case 'CACHE_IO_ERROR':
 *         console.error('Cache directory is not writable');
 *         break;
 *     }
 *   }
 * }
 * ```
 */
export class ResultsControllerError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: ResultsControllerErrorCode;

  /**
   * Original error that caused this error (if any)
   */
  readonly cause?: Error;

  /**
   * Additional context for debugging
   */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ResultsControllerErrorCode,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResultsControllerError';
    this.code = code;
    this.cause = cause;
    this.context = context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ResultsControllerError);
    }
  }

  /**
   * Create a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }

  /**
   * Type guard to check if an error is a ResultsControllerError
   */
  static isResultsControllerError(error: unknown): error is ResultsControllerError {
    return error instanceof ResultsControllerError;
  }

  /**
   * Create error for an invalid fetch request or section key path
   */
  static configuration(reason: string, context?: Record<string, unknown>): ResultsControllerError {
    return new ResultsControllerError(
      `Invalid controller configuration: ${reason}`,
      'CONFIGURATION_ERROR',
      undefined,
      context
    );
  }

  /**
   * Create error for a failed query execution
   */
  static queryFailed(
    entityName: string,
    cause: Error,
    context?: Record<string, unknown>
  ): ResultsControllerError {
    return new ResultsControllerError(
      `Query on "${entityName}" failed: ${cause.message}`,
      'QUERY_EXECUTION_FAILED',
      cause,
      { entityName, ...context }
    );
  }

  /**
   * Create error for an unreadable or unwritable cache record
   */
  static cacheIo(
    operation: 'read' | 'write' | 'remove' | 'list',
    cacheName: string | undefined,
    cause?: Error
  ): ResultsControllerError {
    const target = cacheName === undefined ? 'all caches' : `cache "${cacheName}"`;
    return new ResultsControllerError(
      `Failed to ${operation} ${target}${cause ? `: ${cause.message}` : ''}`,
      'CACHE_IO_ERROR',
      cause,
      { operation, cacheName }
    );
  }

  /**
   * Create error for deleting a cache that a live controller still uses
   */
  static cacheInUse(cacheNames: string[]): ResultsControllerError {
    return new ResultsControllerError(
      `Cannot delete cache while a controller is attached: ${cacheNames.join(', ')}`,
      'PRECONDITION_VIOLATION',
      undefined,
      { cacheNames }
    );
  }

  /**
   * Create error for a broken diff or cursor invariant
   */
  static invariant(reason: string, context?: Record<string, unknown>): ResultsControllerError {
    return new ResultsControllerError(
      `Layout invariant violated: ${reason}`,
      'INVARIANT_VIOLATION',
      undefined,
      context
    );
  }

  /**
   * Create error for invalid state transition
   */
  static invalidState(
    currentState: string,
    attemptedOperation: string,
    context?: Record<string, unknown>
  ): ResultsControllerError {
    return new ResultsControllerError(
      `Invalid operation "${attemptedOperation}" in state "${currentState}"`,
      'INVALID_STATE',
      undefined,
      { currentState, attemptedOperation, ...context }
    );
  }
}
