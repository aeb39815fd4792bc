import { log } from 'apify';

import { REQUEST_TIMEOUT_MS, RETRY_POLICY } from './constants.js';
import { errorMessage } from './errors.js';
import { gotHttpClient, type HttpClient } from './http.js';
import { type RetryPolicy, sleep, type Sleep } from './retry.js';
import type { Log } from './types.js';

/** Everything a component needs from the process, handed over explicitly so tests can swap it. */
export interface RunContext {
    http: HttpClient;
    log: Log;
    retryPolicy: RetryPolicy;
    sleep: Sleep;
    timeoutMs: number;
    now: () => Date;
}

export const createRunContext = (overrides: Partial<RunContext> = {}): RunContext => ({
    http: gotHttpClient,
    log,
    retryPolicy: RETRY_POLICY,
    sleep,
    timeoutMs: REQUEST_TIMEOUT_MS,
    now: () => new Date(),
    ...overrides,
});

/** Retry hooks that log each failed attempt with the component prefix. */
export const retryOptions = (context: RunContext, prefix: string, what: string) => ({
    sleep: context.sleep,
    onRetry: (error: unknown, attempt: number, delayMs: number) => {
        context.log.warning(
            `${prefix} ${what} failed (attempt ${attempt}): ${errorMessage(error)}. Retrying in ${delayMs}ms`,
        );
    },
});
