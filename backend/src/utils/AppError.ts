import { ERROR_CODES, ErrorCode } from '../../../shared/errorCodes';

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
    public readonly exitCode: number;
    public readonly errorCode: ErrorCode;
    public readonly isOperational: boolean;
    public readonly details?: ErrorDetails;

    constructor(exitCode: number, errorCode: ErrorCode, message: string, isOperational = true, details?: ErrorDetails) {
        super(message);
        this.exitCode = exitCode;
        this.errorCode = errorCode;
        this.isOperational = isOperational;
        this.details = details;
        
        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }

    /**
     * Builds an error from the shared code table, optionally overriding the default message.
     */
    static from(errorCode: ErrorCode, message?: string, details?: ErrorDetails): AppError {
        const entry = ERROR_CODES[errorCode];
        return new AppError(entry.exitCode, errorCode, message ?? entry.message, true, details);
    }
}

export const errorMessage = (err: unknown): string => err instanceof Error ? err.message : String(err);

export const errnoCode = (err: unknown): string | undefined => {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
};
