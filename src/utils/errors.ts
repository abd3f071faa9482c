// src/utils/errors.ts

export type LoadErrorCode =
    | "SOURCE_MISSING"
    | "SOURCE_UNREADABLE"
    | "SCHEMA_MISMATCH"
    | "INVALID_ROW";

/** Records table could not be loaded. Fatal at start-up. */
export class LoadError extends Error {
    readonly code: LoadErrorCode;
    readonly path: string;

    constructor(code: LoadErrorCode, path: string, message: string, options?: { cause?: unknown }) {
        super(`${message} (${path})`, options);
        this.name = "LoadError";
        this.code = code;
        this.path = path;
    }
}

/** Request-level failure with an HTTP status; rendered by errorHandler. */
export class HttpError extends Error {
    readonly status: number;

    constructor(status: number, message: string) {
        super(message);
        this.name = "HttpError";
        this.status = status;
    }
}
