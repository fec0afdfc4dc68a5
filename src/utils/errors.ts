/**
 * Error types that cross module boundaries.
 *
 * HTTP failures do not appear here: the request executor returns them as
 * tagged results instead of throwing.
 */

/** Missing credential, registry or query file. Aborts a run before any record is touched. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/** A transition needs a field the record does not carry. */
export class MissingFieldError extends Error {
    constructor(
        readonly recordId: string,
        readonly fields: readonly string[],
    ) {
        super(`Missing required field(s) ${fields.join(', ')} on ${recordId}`);
        this.name = 'MissingFieldError';
    }
}

export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        message: string,
    ) {
        super(`Request failed with status ${status}: ${message}`);
        this.name = 'HttpStatusError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
