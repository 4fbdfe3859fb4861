/**
 * Shared error handling utilities and the error types raised outside the
 * sandbox. The sandbox itself never throws; it reports through its result.
 */

/** Extract a human-readable message from an unknown thrown value. */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/** The model replied with something that is not the expected JSON object. */
export class ModelResponseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ModelResponseError';
    }
}

/** No usable API key is configured for the model endpoint. */
export class CredentialsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialsError';
    }
}

/** The model endpoint could not be reached or answered with a non-2xx status. */
export class ModelTransportError extends Error {
    readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'ModelTransportError';
        this.status = options?.status;
    }
}

/** A dataset file could not be read, decoded or parsed. */
export class DatasetLoadError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DatasetLoadError';
    }
}
