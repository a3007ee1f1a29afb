export type ErrorCode =
    | 'INVALID_CREDENTIALS'
    | 'INVALID_TOKEN'
    | 'AUTH_REQUIRED'
    | 'ACCOUNT_DISABLED'
    | 'INSUFFICIENT_PERMISSION'
    | 'VALIDATION_ERROR'
    | 'INTERNAL_ERROR';

/** The single message clients see for any token or session record failure. */
export const INVALID_CREDENTIAL_MESSAGE = 'Invalid or expired credential';

export class AppError extends Error {
    public readonly statusCode: number;
    public readonly code: ErrorCode;

    constructor(message: string, statusCode: number, code: ErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AppError';
        this.statusCode = statusCode;
        this.code = code;
    }
}

export class AuthError extends AppError {
    constructor(message = INVALID_CREDENTIAL_MESSAGE, code: ErrorCode = 'INVALID_TOKEN') {
        super(message, 401, code);
        this.name = 'AuthError';
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string, code: ErrorCode = 'INSUFFICIENT_PERMISSION') {
        super(message, 403, code);
        this.name = 'ForbiddenError';
    }
}

/** Store or other backing-service failure. Clients see a generic 500. */
export class InfrastructureError extends AppError {
    constructor(operation: string, cause: unknown) {
        super(`${operation} failed`, 500, 'INTERNAL_ERROR', { cause });
        this.name = 'InfrastructureError';
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}
