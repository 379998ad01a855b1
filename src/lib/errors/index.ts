import { ErrorHttpStatus, type ServiceError } from '../../types/index.js';

export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(
        message: string,
        code: string,
        statusCode: number,
        isOperational: boolean = true,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.code = code;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        this.details = details;
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }

    /**
     * Lift a domain failure into a throwable for HTTP surfaces.
     */
    static fromServiceError(error: ServiceError): AppError {
        return new AppError(error.message, error.code, ErrorHttpStatus[error.code], true, error.details);
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', 400);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 'NOT_FOUND', 404);
    }
}

/** A broken internal rule, never an expected outcome. */
export class InternalError extends AppError {
    constructor(message: string) {
        super(message, 'INTERNAL_ERROR', 500, false);
    }
}

/**
 * Durable state could not be written or read. The owning process must stop:
 * running on unpersisted state loses track of money or goods.
 */
export class PersistenceError extends AppError {
    public readonly file: string;

    constructor(message: string, file: string, options?: { cause?: unknown }) {
        super(message, 'PERSISTENCE_ERROR', 500, false, { file });
        this.file = file;
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/** Only lost durability stops a process; every other fault is answered and survived. */
export function isFatal(error: unknown): boolean {
    return error instanceof PersistenceError;
}

export function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
