/** Bad run input, including a postal code that does not resolve. Aborts the run. */
export class InputError extends Error {
    override name = 'InputError';
}

/** A response that arrived but cannot be used: non-2xx status or a body of the wrong shape. */
export class TransportError extends Error {
    override name = 'TransportError';

    constructor(
        message: string,
        readonly url: string,
        readonly statusCode: number | null = null,
    ) {
        super(message);
    }
}

export class RetryExhaustedError extends Error {
    override name = 'RetryExhaustedError';

    constructor(
        readonly attempts: number,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Gave up after ${attempts} attempts: ${reason}`, { cause });
    }
}

/** A search result that lacks a field the row cannot do without. */
export class InvalidListingError extends Error {
    override name = 'InvalidListingError';
}

export type EnrichmentFailure = 'transport' | 'missing-description';

export class EnrichmentError extends Error {
    override name = 'EnrichmentError';

    constructor(
        readonly url: string,
        readonly reason: EnrichmentFailure,
        cause?: unknown,
    ) {
        super(`Could not enrich ${url} (${reason})`, { cause });
    }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
