/**
 * Error contract shared by the registry, the config locator and the commands.
 */
export class SrcgenError extends Error {
    constructor(
        public readonly code: string,
        message: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'SrcgenError';
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * The configuration directory could not be located.
 */
export class ConfigError extends SrcgenError {
    constructor(code: string, message: string, details?: Record<string, unknown>) {
        super(code, message, details);
        this.name = 'ConfigError';
    }
}

export type SourceErrorCode =
    | 'SOURCES_NOT_FOUND'
    | 'SOURCES_MALFORMED'
    | 'SOURCE_EXISTS'
    | 'SOURCE_NAME_INVALID'
    | 'SOURCE_NOT_FOUND'
    | 'SOURCE_RESERVED';

/**
 * Registry failures: missing or malformed file, duplicate or unknown names.
 */
export class SourceError extends SrcgenError {
    constructor(public readonly code: SourceErrorCode, message: string, details?: Record<string, unknown>) {
        super(code, message, details);
        this.name = 'SourceError';
    }
}

export function isSourceError(error: unknown, code?: SourceErrorCode): error is SourceError {
    return error instanceof SourceError && (code === undefined || error.code === code);
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
