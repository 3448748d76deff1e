import { ERROR_CODES } from '../../../shared/errorCodes';
import { AppError } from './AppError';
import { logger } from './logger';

/**
 * Logs a failure the way the CLI reports it and returns the process exit code.
 */
export const handleCliError = (err: unknown): number => {
    if (err instanceof AppError) {
        const step = typeof err.details?.step === 'string' ? ` [step: ${err.details.step}]` : '';
        if (err.isOperational) {
            logger.warn(`[OperationalError] ${err.errorCode}: ${err.message}${step}`);
        } else {
            logger.error(`[SystemError] ${err.errorCode}: ${err.message}${step} | ${err.stack || ''}`);
        }
        return err.exitCode;
    }

    // Unhandled errors
    const errorMsg = err instanceof Error ? err.stack || err.message : String(err);
    logger.error(`[UnhandledError] ${errorMsg}`);
    return ERROR_CODES.E_UNKNOWN.exitCode;
};
