/**
 * Error taxonomy for the configuration state library.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes (extend as needed). */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    UNSUPPORTED_VERSION: 'UNSUPPORTED_VERSION',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic metadata attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public override readonly cause?: unknown;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context (parameter ids, paths, etc.)
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

/** ValidationError indicates input, persisted state or catalog data failed schema or semantic validation. */
export class ValidationError extends AppError {
    /**
     * @param message string - Description of validation failure
     * @param details ErrorDetails|undefined - Offending field info, schema path, etc.
     * @param cause unknown - Underlying Joi or parser error
     */
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details, cause);
    }
}

/** NotFoundError when a requested resource (catalog file, preset list) does not exist. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** UnsupportedVersionError when persisted or imported state carries a foreign format version. */
export class UnsupportedVersionError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.UNSUPPORTED_VERSION, message, details);
    }
}

/** Generic internal error wrapper when no more specific category applies. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}

/**
 * Converts a Joi validation error into a ValidationError, keeping the offending paths.
 * @param context string - What was being validated (e.g. 'profile catalog')
 * @param error { message: string; details: { path: (string | number)[] }[] } - Joi error
 * @returns ValidationError
 */
export function FromJoiError(
    context: string,
    error: { message: string; details: { path: (string | number)[]; message: string }[] },
): ValidationError {
    return new ValidationError(
        `Invalid ${context}: ${error.message}`,
        {
            issues: error.details.map(detail => {
                return { path: detail.path.join('.'), message: detail.message };
            }),
        },
        error,
    );
}
