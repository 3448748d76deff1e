export const ERROR_CODES = {
    // System / Generic
    E_UNKNOWN: { code: 'E_UNKNOWN', message: 'An unknown error occurred.', exitCode: 1 },
    E_PERMISSION_DENIED: { code: 'E_PERMISSION_DENIED', message: 'Elevated privileges (root) are required.', exitCode: 77 },
    E_BUSY: { code: 'E_BUSY', message: 'Another dnsswitch operation is in progress.', exitCode: 75 },

    // Files
    E_IO_FAILURE: { code: 'E_IO_FAILURE', message: 'A filesystem operation failed.', exitCode: 74 },
    E_CORRUPT_BACKUP: { code: 'E_CORRUPT_BACKUP', message: 'Backup content does not match its recorded digest.', exitCode: 65 },
    E_BACKUP_NOT_FOUND: { code: 'E_BACKUP_NOT_FOUND', message: 'Backup not found.', exitCode: 66 },

    // Providers / Input
    E_UNKNOWN_PROVIDER: { code: 'E_UNKNOWN_PROVIDER', message: 'No registered provider matches that selection.', exitCode: 64 },
    E_DOT_UNSUPPORTED: { code: 'E_DOT_UNSUPPORTED', message: 'This provider does not support DNS-over-TLS.', exitCode: 64 },

    // Resolver service
    E_SERVICE_FAILURE: { code: 'E_SERVICE_FAILURE', message: 'The system resolver service could not be controlled.', exitCode: 69 },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;
