export const ERROR_PREFIX = "@tesserae/mosaic";

export type MosaicErrorCode =
    | "ANALYSIS"
    | "INVALID_QUERY"
    | "INVALID_CONFIG"
    | "TABLE_PERSISTENCE";

export class MosaicError extends Error {
    readonly code: MosaicErrorCode;
    /** Message without the package prefix. */
    readonly detail: string;

    constructor(code: MosaicErrorCode, message: string, options?: { cause?: unknown }) {
        super(`${ERROR_PREFIX}: ${message}`, options);
        this.name = new.target.name;
        this.code = code;
        this.detail = message;
    }
}

/**
 * A file or frame could not be analysed (or decoded).
 *
 * Batch analysis recovers by skipping the whole file.
 */
export class AnalysisError extends MosaicError {
    /** File being analysed, when known. */
    readonly path: string | undefined;

    constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
        super("ANALYSIS", message, { cause: options.cause });
        this.path = options.path;
    }
}

/** A similarity request is malformed. Fatal to that single match call. */
export class InvalidQueryError extends MosaicError {
    constructor(message: string) {
        super("INVALID_QUERY", message);
    }
}

export class InvalidConfigError extends MosaicError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INVALID_CONFIG", message, options);
    }
}

/** A persisted table or manifest cannot be read back. */
export class TablePersistenceError extends MosaicError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("TABLE_PERSISTENCE", message, options);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
