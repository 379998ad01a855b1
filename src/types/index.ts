// Core result and error types shared by every service

// ============================================
// Service Result
// ============================================

export interface ServiceError {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
}

export type Success<T> = { success: true; data: T };
export type Failure = { success: false; error: ServiceError };

export type ServiceResult<T> = Success<T> | Failure;

export function ok<T>(data: T): Success<T> {
    return { success: true, data };
}

export function fail(code: ErrorCode, message: string, details?: Record<string, unknown>): Failure {
    return details
        ? { success: false, error: { code, message, details } }
        : { success: false, error: { code, message } };
}

// ============================================
// Error Codes Catalog
//
// Every code belongs to exactly one error class. Callers branch on the class
// (e.g. transport ambiguity triggers compensation), the code is for clients.
// ============================================

export const ErrorCodes = {
    // --- validation ----------------------------------------------------------
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    UNKNOWN_REQUEST: 'UNKNOWN_REQUEST',
    ITEM_MISMATCH: 'ITEM_MISMATCH',
    NOT_PRICED: 'NOT_PRICED',

    // --- authorization -------------------------------------------------------
    NOT_FOUND: 'NOT_FOUND',
    UNKNOWN_ACCOUNT: 'UNKNOWN_ACCOUNT',
    BAD_CREDENTIAL: 'BAD_CREDENTIAL',
    NOT_APPROVED: 'NOT_APPROVED',
    NOT_LISTING_OWNER: 'NOT_LISTING_OWNER',
    ALREADY_EXISTS: 'ALREADY_EXISTS',
    IDEMPOTENCY_CONFLICT: 'IDEMPOTENCY_CONFLICT',
    TRANSFER_VOIDED: 'TRANSFER_VOIDED',

    // --- insufficient resource -----------------------------------------------
    INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
    INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
    DELIVERY_FAILED: 'DELIVERY_FAILED',
    VAULT_NOT_CONFIGURED: 'VAULT_NOT_CONFIGURED',

    // --- transport ambiguity -------------------------------------------------
    TIMEOUT: 'TIMEOUT',

    // --- unrecovered inconsistency -------------------------------------------
    UNRECOVERED_INCONSISTENCY: 'UNRECOVERED_INCONSISTENCY',

    // --- internal ------------------------------------------------------------
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type ErrorClass =
    | 'validation'
    | 'authorization'
    | 'insufficient_resource'
    | 'transport_ambiguity'
    | 'unrecovered_inconsistency'
    | 'internal';

export const ERROR_CLASS: Record<ErrorCode, ErrorClass> = {
    VALIDATION_ERROR: 'validation',
    UNKNOWN_REQUEST: 'validation',
    ITEM_MISMATCH: 'validation',
    NOT_PRICED: 'validation',
    NOT_FOUND: 'authorization',
    UNKNOWN_ACCOUNT: 'authorization',
    BAD_CREDENTIAL: 'authorization',
    NOT_APPROVED: 'authorization',
    NOT_LISTING_OWNER: 'authorization',
    ALREADY_EXISTS: 'authorization',
    IDEMPOTENCY_CONFLICT: 'authorization',
    TRANSFER_VOIDED: 'authorization',
    INSUFFICIENT_FUNDS: 'insufficient_resource',
    INSUFFICIENT_STOCK: 'insufficient_resource',
    DELIVERY_FAILED: 'insufficient_resource',
    VAULT_NOT_CONFIGURED: 'insufficient_resource',
    TIMEOUT: 'transport_ambiguity',
    UNRECOVERED_INCONSISTENCY: 'unrecovered_inconsistency',
    INTERNAL_ERROR: 'internal',
};

export const ErrorHttpStatus: Record<ErrorCode, number> = {
    VALIDATION_ERROR: 400,
    UNKNOWN_REQUEST: 400,
    ITEM_MISMATCH: 400,
    NOT_PRICED: 400,
    NOT_FOUND: 404,
    UNKNOWN_ACCOUNT: 404,
    BAD_CREDENTIAL: 401,
    NOT_APPROVED: 403,
    NOT_LISTING_OWNER: 403,
    ALREADY_EXISTS: 409,
    IDEMPOTENCY_CONFLICT: 409,
    TRANSFER_VOIDED: 409,
    INSUFFICIENT_FUNDS: 409,
    INSUFFICIENT_STOCK: 409,
    DELIVERY_FAILED: 409,
    VAULT_NOT_CONFIGURED: 503,
    TIMEOUT: 504,
    UNRECOVERED_INCONSISTENCY: 500,
    INTERNAL_ERROR: 500,
};

const ERROR_CODE_SET: ReadonlySet<string> = new Set(Object.values(ErrorCodes));

export function isErrorCode(value: unknown): value is ErrorCode {
    return typeof value === 'string' && ERROR_CODE_SET.has(value);
}

export function errorClassOf(code: ErrorCode): ErrorClass {
    return ERROR_CLASS[code];
}
