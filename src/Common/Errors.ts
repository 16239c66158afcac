/**
 * Error taxonomy for the tag registry.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    CONFLICT: 'CONFLICT',
    SOFT_CONFLICT: 'SOFT_CONFLICT',
    STORAGE_ERROR: 'STORAGE_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic payload attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics (NOT user-facing secrets). */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public readonly cause?: unknown;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context (equipment ids, tags, etc.)
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** ValidationError indicates malformed input (numeric parameters, empty pattern, bad configuration). Never retried automatically. */
export class ValidationError extends AppError {
    /**
     * @param message string - Description of validation failure
     * @param details ErrorDetails|undefined - Offending field info, schema path, etc.
     */
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/** ConflictError for duplicate proposed tags inside one batch. Always fatal to the attempted apply. */
export class ConflictError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.CONFLICT, message, details);
    }
}

/** SoftConflictError when proposed tags collide with unrelated active equipment. Recoverable by explicit override. */
export class SoftConflictError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.SOFT_CONFLICT, message, details);
    }
}

/** StorageError represents persistence layer failures (driver, transaction, I/O). */
export class StorageError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.STORAGE_ERROR, message, details, cause);
    }
}

/** NotFoundError when a requested entity does not exist. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** Generic internal error wrapper when no more specific category applies. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}

/** Narrows an unknown thrown value to AppError. */
export function IsAppError(value: unknown): value is AppError {
    return value instanceof AppError;
}

/**
 * Renders any thrown value as a message string.
 * @example
 * DescribeError(new Error('boom')); // 'boom'
 * DescribeError('plain'); // 'plain'
 */
export function DescribeError(value: unknown): string {
    if (value instanceof Error) {
        return value.message;
    }
    return String(value);
}
