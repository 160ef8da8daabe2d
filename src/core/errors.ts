/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

export type DocumentFormatErrorCode =
    | 'MISSING_SEPARATOR'
    | 'MISSING_MARKER'
    | 'MISSING_BRACKET'
    | 'LINE_COUNT_MISMATCH';

/**
 * Error thrown when a keyframe document cannot be decoded.
 * The whole document is rejected; no partial model is produced.
 */
export class DocumentFormatError extends AppError {
    constructor(
        public readonly reason: DocumentFormatErrorCode,
        detail: string
    ) {
        super(`Format error: ${detail}`, reason);
        this.name = 'DocumentFormatError';
    }
}
