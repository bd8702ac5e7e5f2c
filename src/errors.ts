/**
 * Errors raised on purpose by the service. The HTTP layer maps each to its status code;
 * anything that is not an AppError is treated as an internal failure.
 */
export abstract class AppError extends Error {
    abstract readonly status: number;
    abstract readonly code: string;

    constructor(message: string, readonly details?: unknown) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The upload as a whole cannot be read as tabular text.
 */
export class FormatError extends AppError {
    readonly status = 400;
    readonly code = 'format_error';
}

export class RequestValidationError extends AppError {
    readonly status = 400;
    readonly code = 'validation_error';
}

export class AuthenticationError extends AppError {
    readonly status = 401;
    readonly code = 'unauthorized';
}

export class NotFoundError extends AppError {
    readonly status = 404;
    readonly code = 'not_found';
}

export class ConflictError extends AppError {
    readonly status = 409;
    readonly code = 'conflict';
}

export class PayloadTooLargeError extends AppError {
    readonly status = 413;
    readonly code = 'payload_too_large';
}
